#!/usr/bin/env node
import { runCli } from './cli.js';
import { logError } from './services/logger.js';

const controller = new AbortController();

process.on('uncaughtException', (error) => {
  logError('Uncaught exception', error);
  process.stderr.write(`Uncaught exception: ${error.message}\n`);
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logError('Unhandled rejection', error);
  process.stderr.write(`Unhandled rejection: ${error.message}\n`);
});

process.once('SIGINT', () => {
  process.stderr.write('Interrupted, cancelling in-flight requests...\n');
  controller.abort();
});

process.exitCode = await runCli(process.argv.slice(2), controller.signal);
