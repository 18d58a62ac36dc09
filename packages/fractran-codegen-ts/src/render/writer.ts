export class LineWriter {
  private readonly lines: string[] = [];
  private depth = 0;

  constructor(private readonly unit = '  ') {}

  /** Blank separator line, skipped at the start of the output or of a block. */
  gap(): this {
    const last = this.lines[this.lines.length - 1];
    if (last === undefined || last === '' || last.endsWith('{')) return this;
    return this.line();
  }

  line(text = ''): this {
    this.lines.push(text === '' ? '' : this.unit.repeat(this.depth) + text);
    return this;
  }

  indented(fn: () => void): this {
    this.depth += 1;
    try {
      fn();
    } finally {
      this.depth -= 1;
    }
    return this;
  }

  toString(): string {
    return this.lines.join('\n') + '\n';
  }
}
