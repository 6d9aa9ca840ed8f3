#!/usr/bin/env node

// Thin orchestrator: real logic in ./cli/commands & ./lib
import { runCli } from './cli/program.js';
import { handleError } from './cli/utils/errors.js';

const io = {
  out: (text: string) => process.stdout.write(text),
  err: (text: string | Uint8Array) => process.stderr.write(text),
};

process.on('unhandledRejection', (err) => {
  handleError(err, io);
  process.exit(1);
});
process.on('uncaughtException', (err) => {
  handleError(err, io);
  process.exit(1);
});

runCli(process.argv.slice(2)).catch((err: unknown) => {
  handleError(err, io);
  process.exit(1);
});
