/**
 * CLI Error Handling
 *
 * Turns a failed parse (or an unexpected exception) into the diagnostic line
 * and the exit status.
 */

import { ErrorCodes, XzoptError } from '../../core/errors.js';
import { createComponentLogger } from '../../utils/logger.js';
import { PROGRAM_NAME } from '../../version.js';

const logger = createComponentLogger('cli');

export const EXIT_SUCCESS = 0;
export const EXIT_ERROR = 1;

export interface ErrorSink {
  stderr(text: string): void;
}

// Failures caused by how the command line was written
const USAGE_ERRORS: ReadonlySet<string> = new Set([
  ErrorCodes.UNKNOWN_OPTION,
  ErrorCodes.MISSING_ARGUMENT,
]);

/**
 * Build the lines written to stderr for a failure.
 */
export function formatDiagnostic(error: unknown, programName: string = PROGRAM_NAME): string {
  if (error instanceof XzoptError) {
    const lines = [`${programName}: ${error.message}`];
    if (USAGE_ERRORS.has(error.code)) {
      lines.push(`${programName}: Try \`${programName} --help' for more information.`);
    }
    return lines.join('\n') + '\n';
  }

  const message = error instanceof Error ? error.message : String(error);
  return `${programName}: ${message}\n`;
}

/**
 * Handle CLI errors consistently. Returns the exit status.
 */
export function handleCliError(error: unknown, sink: ErrorSink): number {
  if (error instanceof XzoptError) {
    logger.debug({ code: error.code, context: error.context }, error.message);
  } else {
    logger.error({ err: error }, 'unexpected failure');
  }

  sink.stderr(formatDiagnostic(error));
  return EXIT_ERROR;
}
