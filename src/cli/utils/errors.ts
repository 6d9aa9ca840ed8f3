import chalk from 'chalk';
import { ExternalCommandError } from '../../lib/errors.js';
import type { CliIo } from '../context.js';

/**
 * Central error handler for CLI commands. A failed external program's stderr
 * is passed through untouched for the calling automation to capture.
 */
export function handleError(error: unknown, io: CliIo): void {
  if (error instanceof ExternalCommandError) {
    io.err(error.rawStderr.length > 0 ? error.rawStderr : error.message + '\n');
  } else if (error instanceof Error) {
    io.err(chalk.red('Error:') + ' ' + error.message + '\n');
  } else {
    io.err('Unknown error: ' + String(error) + '\n');
  }
}
