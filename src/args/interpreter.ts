/**
 * Flag Interpreter
 *
 * Folds option events into the argument state. The same interpreter serves
 * the environment pass and the command-line pass, so every flag works from
 * both places and later events override earlier ones.
 */

import {
  createFilesListConflictError,
  createInvalidSuffixError,
  createUnknownCheckError,
  createUnknownFormatError,
} from '../core/errors.js';
import { fail, ok, type Result } from '../core/result.js';
import {
  Verbosity,
  type ArgumentState,
  type CheckKind,
  type ContainerFormat,
  type RecordSeparator,
} from '../core/types.js';
import { addFilter } from '../filters/chain.js';
import { parseUnsignedInteger } from '../utils/parse-integer.js';
import { splitArguments, type OptionEvent } from './tokens.js';

export type FlagOutcome =
  | { kind: 'continue'; state: ArgumentState }
  | { kind: 'help' }
  | { kind: 'version' };

export type Interpretation =
  | { kind: 'continue'; state: ArgumentState; operands: string[] }
  | { kind: 'help' }
  | { kind: 'version' };

const FORMATS: ReadonlyMap<string, ContainerFormat> = new Map([
  ['auto', 'auto'],
  ['xz', 'xz'],
  ['lzma', 'lzma'],
  // name used by LZMA Utils 4.32.x
  ['alone', 'lzma'],
  ['raw', 'raw'],
]);

const CHECKS: ReadonlyMap<string, CheckKind> = new Map([
  ['none', 'none'],
  ['crc32', 'crc32'],
  ['crc64', 'crc64'],
  ['sha256', 'sha256'],
]);

const VERBOSITY_MIN = Verbosity.Silent;
const VERBOSITY_MAX = Verbosity.Debug;

function adjustVerbosity(verbosity: Verbosity, step: -1 | 1): Verbosity {
  if (step < 0) {
    return verbosity > VERBOSITY_MIN ? verbosity - 1 : verbosity;
  }
  return verbosity < VERBOSITY_MAX ? verbosity + 1 : verbosity;
}

function continueWith(state: ArgumentState): Result<FlagOutcome> {
  return ok({ kind: 'continue', state });
}

function withConfig(state: ArgumentState, patch: Partial<ArgumentState['config']>): ArgumentState {
  return { ...state, config: { ...state.config, ...patch } };
}

function requestFilesList(
  state: ArgumentState,
  path: string | undefined,
  separator: RecordSeparator
): Result<FlagOutcome> {
  if (state.filesList) {
    return fail(createFilesListConflictError());
  }

  return continueWith({
    ...state,
    filesList: path === undefined ? { separator } : { path, separator },
  });
}

/**
 * Apply a single option event.
 */
export function applyFlag(state: ArgumentState, event: OptionEvent): Result<FlagOutcome> {
  const { action } = event.definition;
  // `--delta=` and a bare `--delta` both mean "no options"
  const value = event.value === '' ? undefined : event.value;
  const text = event.value ?? '';

  switch (action.type) {
    case 'preset':
      return continueWith({ ...state, preset: { level: action.level, isDefault: false } });

    case 'filter': {
      const filters = addFilter(state.filters, action.filter, value);
      if (!filters.success) return filters;
      return continueWith({
        ...state,
        filters: filters.value,
        preset: { ...state.preset, isDefault: false },
      });
    }

    case 'memory': {
      const limit = parseUnsignedInteger('memory', text, 1, Number.MAX_SAFE_INTEGER);
      if (!limit.success) return limit;
      return continueWith(withConfig(state, { memoryBudget: limit.value }));
    }

    case 'threads': {
      const threads = parseUnsignedInteger('threads', text, 1, Number.MAX_SAFE_INTEGER);
      if (!threads.success) return threads;
      return continueWith(withConfig(state, { threadsRequested: threads.value }));
    }

    case 'suffix':
      // an empty suffix or one with a slash would break output naming
      if (text === '' || text.includes('/')) {
        return fail(createInvalidSuffixError(text));
      }
      return continueWith(withConfig(state, { suffix: text }));

    case 'format': {
      const format = FORMATS.get(text);
      if (format === undefined) return fail(createUnknownFormatError(text));
      return continueWith(withConfig(state, { format }));
    }

    case 'check': {
      const check = CHECKS.get(text);
      if (check === undefined) return fail(createUnknownCheckError(text));
      return continueWith(withConfig(state, { check }));
    }

    case 'files':
      return requestFilesList(state, value, '\n');

    case 'files0':
      return requestFilesList(state, value, '\0');

    case 'name':
      return continueWith(withConfig(state, { preserveName: true }));

    case 'no-name':
      return continueWith(withConfig(state, { preserveName: false }));

    case 'stdout':
      return continueWith(withConfig(state, { stdout: true }));

    case 'force':
      return continueWith(withConfig(state, { force: true }));

    case 'keep':
      return continueWith(withConfig(state, { keepOriginal: true }));

    case 'compress':
      return continueWith(withConfig(state, { mode: 'compress' }));

    case 'decompress':
      return continueWith(withConfig(state, { mode: 'decompress' }));

    case 'list':
      return continueWith(withConfig(state, { mode: 'list' }));

    case 'test':
      return continueWith(withConfig(state, { mode: 'test' }));

    case 'quiet':
      return continueWith(
        withConfig(state, { verbosity: adjustVerbosity(state.config.verbosity, -1) })
      );

    case 'verbose':
      return continueWith(
        withConfig(state, { verbosity: adjustVerbosity(state.config.verbosity, 1) })
      );

    case 'help':
      return ok({ kind: 'help' });

    case 'version':
      return ok({ kind: 'version' });
  }
}

/**
 * Fold events in order. Stops at the first failure or terminal action.
 */
export function interpretFlags(
  state: ArgumentState,
  events: readonly OptionEvent[]
): Result<FlagOutcome> {
  let current = state;

  for (const event of events) {
    const outcome = applyFlag(current, event);
    if (!outcome.success || outcome.value.kind !== 'continue') return outcome;
    current = outcome.value.state;
  }

  return continueWith(current);
}

/**
 * Split raw arguments (program name excluded) and fold them into the state.
 */
export function interpretArguments(
  state: ArgumentState,
  args: readonly string[]
): Result<Interpretation> {
  const split = splitArguments(args);

  const outcome = interpretFlags(state, split.events);
  if (!outcome.success) return outcome;
  if (outcome.value.kind !== 'continue') return ok(outcome.value);

  if (split.failure) return fail(split.failure);

  return ok({ kind: 'continue', state: outcome.value.state, operands: split.operands });
}
