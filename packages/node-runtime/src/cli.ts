#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { stdout, stderr, exit as processExit } from 'node:process';
import { createProgram } from './program.js';

function fail(err: unknown): never {
  if (err instanceof Error) {
    stderr.write(`Error [${err.name}]: ${err.message}\n`);
  } else {
    stderr.write(`Error [Unknown]: ${String(err)}\n`);
  }
  processExit(1);
}

process.on('uncaughtException', fail);
process.on('unhandledRejection', fail);

const program = createProgram({
  stdout: text => stdout.write(text),
  stderr: text => stderr.write(text),
});

program.parseAsync(process.argv).catch(fail);
