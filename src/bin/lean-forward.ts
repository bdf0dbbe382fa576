#!/usr/bin/env node
import { runForwarder } from '../cli.js';

runForwarder(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (err: unknown) => {
    process.stderr.write(`lean-forward: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exit(1);
  }
);
