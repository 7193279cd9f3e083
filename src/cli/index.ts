/**
 * CLI Main Program
 *
 * Parses the arguments, performs --help and --version, and prints the
 * resolved invocation. Returns the exit status instead of exiting so the
 * driver can run inside tests.
 */

import { parseArguments, type ParseOptions } from '../args/index.js';
import { ENVIRONMENT_VARIABLE } from '../args/environment.js';
import { createOptionProgram } from '../args/tokens.js';
import { configRegistry, getAllEnvVars, getConfig } from '../config/index.js';
import { createComponentLogger } from '../utils/logger.js';
import { PROGRAM_NAME, VERSION } from '../version.js';
import { EXIT_SUCCESS, handleCliError } from './utils/errors.js';
import { describeInvocation, formatOutput } from './utils/output.js';

const logger = createComponentLogger('cli');

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

export const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

export interface CliOptions extends ParseOptions {
  io?: CliIO;
}

const ENV_COLUMN_WIDTH = 28;

/**
 * Help text: the flag list from Commander plus the environment variables
 * read at startup.
 */
export function renderHelp(): string {
  const variables = [
    { envKey: ENVIRONMENT_VARIABLE, description: 'Flags applied before the command line.' },
    ...getAllEnvVars(configRegistry),
  ];
  const lines = variables.map(
    ({ envKey, description }) => `  ${envKey.padEnd(ENV_COLUMN_WIDTH)}${description}`
  );

  return `${createOptionProgram().helpInformation()}\nEnvironment:\n${lines.join('\n')}\n`;
}

export function renderVersion(): string {
  return `${PROGRAM_NAME} ${VERSION}\n`;
}

/**
 * Run the CLI program
 */
export function runCli(argv: readonly string[], options: CliOptions = {}): number {
  const io = options.io ?? processIO;

  try {
    // XZOPT_* settings are checked even when the caller passes a budget
    getConfig();

    const parsed = parseArguments(argv, options);
    if (!parsed.success) {
      return handleCliError(parsed.error, io);
    }

    switch (parsed.value.action) {
      case 'help':
        io.stdout(renderHelp());
        return EXIT_SUCCESS;

      case 'version':
        io.stdout(renderVersion());
        return EXIT_SUCCESS;

      case 'run': {
        const { invocation } = parsed.value;
        logger.info(
          {
            mode: invocation.config.mode,
            format: invocation.config.format,
            threads: invocation.config.threadsEffective,
          },
          'configuration resolved'
        );
        io.stdout(`${formatOutput(describeInvocation(invocation))}\n`);
        return EXIT_SUCCESS;
      }
    }
  } catch (error) {
    return handleCliError(error, io);
  }
}
