#!/usr/bin/env node
import { exit } from 'node:process';
import { main } from './index.js';

main(process.argv.slice(2)).then(
  (code) => exit(code),
  (error: unknown) => {
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    exit(2);
  },
);
