/**
 * Filter Registry
 *
 * Static metadata for every filter the command line can name, and the
 * dispatch from a filter id to its option parser.
 */

import { createFilterOptionsError } from '../core/errors.js';
import { fail, ok, type Result } from '../core/result.js';
import { parseDeltaOptions, parseLzmaOptions, parseSubblockOptions } from './options.js';
import type { FilterEntry, FilterId, SimpleFilterId } from './types.js';

/** Filters in one chain, not counting the terminator. */
export const MAX_FILTERS = 7;

export interface FilterMeta {
  id: FilterId;
  /** Name shown in diagnostics */
  displayName: string;
  /** Whether the filter accepts an option string */
  takesOptions: boolean;
}

export const FILTER_REGISTRY: Record<FilterId, FilterMeta> = {
  lzma1: { id: 'lzma1', displayName: 'LZMA1', takesOptions: true },
  lzma2: { id: 'lzma2', displayName: 'LZMA2', takesOptions: true },
  delta: { id: 'delta', displayName: 'Delta', takesOptions: true },
  subblock: { id: 'subblock', displayName: 'Subblock', takesOptions: true },
  x86: { id: 'x86', displayName: 'x86 BCJ', takesOptions: false },
  powerpc: { id: 'powerpc', displayName: 'PowerPC BCJ', takesOptions: false },
  ia64: { id: 'ia64', displayName: 'IA-64 BCJ', takesOptions: false },
  arm: { id: 'arm', displayName: 'ARM BCJ', takesOptions: false },
  armthumb: { id: 'armthumb', displayName: 'ARM-Thumb BCJ', takesOptions: false },
  sparc: { id: 'sparc', displayName: 'SPARC BCJ', takesOptions: false },
};

export function getFilterMeta(id: FilterId): FilterMeta {
  return FILTER_REGISTRY[id];
}

function simpleEntry(id: SimpleFilterId, raw: string | undefined): Result<FilterEntry> {
  if (raw !== undefined) {
    return fail(
      createFilterOptionsError(`${FILTER_REGISTRY[id].displayName} filter takes no options`, {
        filter: id,
        raw,
      })
    );
  }
  return ok({ id });
}

/**
 * Build a filter entry from its id and the raw option string, if any.
 */
export function createFilterEntry(id: FilterId, raw: string | undefined): Result<FilterEntry> {
  switch (id) {
    case 'lzma1':
    case 'lzma2': {
      const options = parseLzmaOptions(raw);
      return options.success ? ok({ id, options: options.value }) : options;
    }
    case 'delta': {
      const options = parseDeltaOptions(raw);
      return options.success ? ok({ id, options: options.value }) : options;
    }
    case 'subblock': {
      const options = parseSubblockOptions(raw);
      return options.success ? ok({ id, options: options.value }) : options;
    }
    default:
      return simpleEntry(id, raw);
  }
}
