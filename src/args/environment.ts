/**
 * Environment Argument Injector
 *
 * XZ_OPT holds flags that apply before the command line, e.g.
 * `XZ_OPT="-9 --threads=4"`. They go through the same interpreter as real
 * arguments, so anything given on the command line wins.
 */

import { createTooManyArgumentsError } from '../core/errors.js';
import { fail, ok, type Result } from '../core/result.js';
import type { ArgumentState } from '../core/types.js';
import { createComponentLogger } from '../utils/logger.js';
import { interpretArguments, type Interpretation } from './interpreter.js';

const logger = createComponentLogger('environment');

export const ENVIRONMENT_VARIABLE = 'XZ_OPT';

/** Largest argument count a C `int` can hold */
export const MAX_ENVIRONMENT_ARGUMENTS = 2 ** 31 - 1;

/** Space, tab, newline, vertical tab, form feed and carriage return */
const WHITESPACE = /[ \t\n\v\f\r]+/;

export function tokenizeArgumentString(text: string): string[] {
  return text.split(WHITESPACE).filter((token) => token !== '');
}

/**
 * Build the synthetic argument vector: the program name, then the tokens.
 */
export function buildEnvironmentArgv(
  programName: string,
  text: string,
  maxArguments: number = MAX_ENVIRONMENT_ARGUMENTS
): Result<string[]> {
  const tokens = tokenizeArgumentString(text);

  if (1 + tokens.length > maxArguments) {
    return fail(createTooManyArgumentsError(ENVIRONMENT_VARIABLE, maxArguments));
  }

  return ok([programName, ...tokens]);
}

export function applyEnvironmentArguments(
  state: ArgumentState,
  env: Record<string, string | undefined>,
  programName: string
): Result<Interpretation> {
  const text = env[ENVIRONMENT_VARIABLE];
  if (text === undefined) {
    return ok({ kind: 'continue', state, operands: [] });
  }

  const argv = buildEnvironmentArgv(programName, text);
  if (!argv.success) return argv;

  logger.debug(
    { variable: ENVIRONMENT_VARIABLE, args: argv.value.slice(1) },
    'applying environment arguments'
  );

  const outcome = interpretArguments(state, argv.value.slice(1));
  if (!outcome.success || outcome.value.kind !== 'continue') return outcome;

  // filenames belong on the command line
  if (outcome.value.operands.length > 0) {
    logger.debug({ ignored: outcome.value.operands }, 'ignoring operands in environment');
  }

  return ok({ kind: 'continue', state: outcome.value.state, operands: [] });
}
