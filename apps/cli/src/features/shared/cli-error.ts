import { ValidationError } from '@reqbench/http';
import { flushLoggers } from '@reqbench/logger';
import pc from 'picocolors';

import { ExitCodes, exitWithCode } from './exit-codes.js';

type Colors = ReturnType<typeof pc.createColors>;

/**
 * Render an error for stderr. Validation failures read as such; anything else
 * is prefixed with its error name. The stack trace is appended in verbose mode.
 */
export function formatCliError(error: Error, verbose: boolean, colors: Colors = pc): string {
  const label = error instanceof ValidationError ? 'Validation Error' : 'Error';
  const detail = error instanceof ValidationError ? error.message : `${error.name}: ${error.message}`;
  let output = `${colors.red('✗')} ${label}: ${detail}\n`;

  if (verbose && error.stack) {
    output += `\n${colors.dim(error.stack)}\n`;
  }

  return output;
}

/**
 * Display a CLI error on stderr and exit with GENERAL_ERROR.
 */
export function displayCliError(error: Error, verbose: boolean): never {
  flushLoggers();
  process.stderr.write(formatCliError(error, verbose));
  exitWithCode(ExitCodes.GENERAL_ERROR);
}
