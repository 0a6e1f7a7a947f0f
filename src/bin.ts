#!/usr/bin/env node
/**
 * json-to-struct CLI entry point
 */

import { runCli } from './cli';
import { logError } from './logger';

runCli(process.argv.slice(2), {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
})
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logError('cli', 'Unexpected failure', error instanceof Error ? error : new Error(String(error)));
    process.exitCode = 1;
  });
