/**
 * Filter Chain Builder
 *
 * Chains are immutable arrays; every operation returns a new one. Order is
 * kept exactly as given. Whether a combination makes sense is the encoder's
 * business, the only structural rule here is the length limit.
 */

import { createTooManyFiltersError } from '../core/errors.js';
import { fail, ok, type Result } from '../core/result.js';
import { MAX_FILTERS, createFilterEntry } from './registry.js';
import {
  CHAIN_TERMINATOR,
  type FilterChain,
  type FilterId,
  type TerminatedFilterChain,
} from './types.js';

export const EMPTY_CHAIN: FilterChain = [];

export function addFilter(
  chain: FilterChain,
  id: FilterId,
  rawOptions?: string
): Result<FilterChain> {
  if (chain.length >= MAX_FILTERS) {
    return fail(createTooManyFiltersError(MAX_FILTERS));
  }

  const entry = createFilterEntry(id, rawOptions);
  if (!entry.success) return entry;

  return ok([...chain, entry.value]);
}

export function terminateChain(chain: FilterChain): TerminatedFilterChain {
  return { entries: chain, terminator: CHAIN_TERMINATOR };
}

/**
 * The legacy container holds exactly one LZMA1 filter.
 */
export function isLegacyCompatible(chain: FilterChain): boolean {
  return chain.length === 1 && chain[0]?.id === 'lzma1';
}
