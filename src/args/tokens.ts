/**
 * Token splitting
 *
 * Commander does the getopt-style work: short flag clusters, attached and
 * detached values, `--name=value` and the `--` terminator. Its option events
 * arrive in command-line order, which is all the interpreter needs; nothing
 * here stores option values.
 */

import { Command, CommanderError, Option } from 'commander';
import {
  createMissingArgumentError,
  createUnknownOptionError,
  type XzoptError,
} from '../core/errors.js';
import {
  FLAG_DEFINITIONS,
  OPTIONAL_VALUE_FLAGS,
  REQUIRED_VALUE_FLAGS,
  type FlagDefinition,
} from './flags.js';

export interface OptionEvent {
  definition: FlagDefinition;
  /** Undefined for flags that take no value */
  value?: string;
}

export interface SplitArguments {
  /** Recognized options, in order */
  events: OptionEvent[];
  /** Non-option arguments */
  operands: string[];
  /** First problem found, reported once the events before it are applied */
  failure?: XzoptError;
}

/**
 * Whether the next argument is the value of `arg`: a flag that requires a
 * value, or a short cluster whose value-taking letter comes last (`-kS`).
 */
function takesDetachedValue(arg: string): boolean {
  if (REQUIRED_VALUE_FLAGS.has(arg)) return true;
  if (!/^-[^-]/.test(arg)) return false;

  // the first value-taking letter swallows the rest of the cluster
  for (let i = 1; i < arg.length; i++) {
    if (REQUIRED_VALUE_FLAGS.has(`-${arg[i]}`)) return i === arg.length - 1;
  }
  return false;
}

/**
 * Commander treats the word after an optional-value flag as its value unless
 * it looks like an option. Here such a value must be attached with '=', so a
 * bare flag is rewritten to carry an empty one.
 */
export function pinOptionalValues(args: readonly string[]): string[] {
  const pinned: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--') {
      pinned.push(...args.slice(i));
      break;
    }

    if (OPTIONAL_VALUE_FLAGS.has(arg)) {
      pinned.push(`${arg}=`);
      continue;
    }

    pinned.push(arg);

    // the value of -S/--suffix etc. is never a flag, even if it looks like one
    if (takesDetachedValue(arg) && i + 1 < args.length) {
      pinned.push(args[i + 1]);
      i++;
    }
  }

  return pinned;
}

export type OptionListener = (event: OptionEvent) => void;

/**
 * Create the Commander program holding every flag. Used for splitting and
 * for rendering the help text.
 */
export function createOptionProgram(onOption?: OptionListener, name = 'xzopt'): Command {
  const program = new Command(name);

  program
    .usage('[OPTION]... [FILE]...')
    .description('Compress or decompress FILEs in the .xz format.')
    .helpOption(false)
    .exitOverride()
    .configureOutput({
      writeOut: () => {},
      writeErr: () => {},
      outputError: () => {},
    });

  for (const definition of FLAG_DEFINITIONS) {
    const option = new Option(definition.flags, definition.description);
    if (definition.hidden) option.hideHelp();
    program.addOption(option);

    if (onOption) {
      program.on(`option:${option.name()}`, (value: unknown) => {
        onOption({ definition, value: typeof value === 'string' ? value : undefined });
      });
    }
  }

  return program;
}

function describeCommanderError(error: CommanderError): string {
  return error.message.replace(/^error: /, '');
}

/**
 * Split raw arguments (without the program name) into option events and
 * operands.
 */
export function splitArguments(args: readonly string[]): SplitArguments {
  const events: OptionEvent[] = [];
  const program = createOptionProgram((event) => events.push(event));

  try {
    const { operands, unknown } = program.parseOptions(pinOptionalValues(args));
    const firstUnknown = unknown[0];
    if (firstUnknown !== undefined) {
      return { events, operands, failure: createUnknownOptionError(firstUnknown) };
    }
    return { events, operands };
  } catch (error) {
    if (error instanceof CommanderError) {
      return {
        events,
        operands: [],
        failure: createMissingArgumentError(describeCommanderError(error)),
      };
    }
    throw error;
  }
}
