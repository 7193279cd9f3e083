/**
 * Memory cost model
 *
 * The resolver only needs peak memory estimates; the codec that owns the
 * real numbers plugs in through MemoryCostModel. defaultCostModel follows
 * the layout of an LZ77 encoder with hash chains or binary trees, which is
 * close enough to size presets against a budget.
 */

import { MATCH_FINDER_HASH_BYTES } from './options.js';
import type { FilterEntry, LzmaOptions, TerminatedFilterChain } from './types.js';

export type CoderDirection = 'encoder' | 'decoder';

export interface MemoryCostModel {
  /** Peak bytes used by one coder instance for the chain */
  estimate(chain: TerminatedFilterChain, direction: CoderDirection): number;
}

/** Per-chain coder bookkeeping */
export const CHAIN_BASE_USAGE = 2 ** 15;
/** BCJ and delta state */
export const SMALL_FILTER_USAGE = 2 ** 10;
/** Probability and price tables of the LZMA encoder */
export const LZMA_ENCODER_STATE = 384 * 1024;
/** Probability tables of the LZMA decoder */
export const LZMA_DECODER_STATE = 28 * 1024;
/** Uncompressed chunk buffer of the LZMA2 encoder */
export const LZMA2_CHUNK_BUFFER = 2 ** 16;
/** Longest match the LZMA encoder emits */
const MATCH_LEN_MAX = 273;
const HASH_2_SIZE = 2 ** 10;
const HASH_3_SIZE = 2 ** 16;

function hashTableSize(dictSize: number, hashBytes: number): number {
  if (hashBytes === 2) return 2 ** 16;

  let hs = dictSize - 1;
  hs |= hs >>> 1;
  hs |= hs >>> 2;
  hs |= hs >>> 4;
  hs |= hs >>> 8;
  hs |= hs >>> 16;
  hs >>>= 1;
  hs |= 0xffff;

  if (hs > 2 ** 24) {
    hs = hashBytes === 3 ? 2 ** 24 - 1 : hs >>> 1;
  }

  return hs + 1;
}

export function lzEncoderUsage(options: LzmaOptions): number {
  const hashBytes = MATCH_FINDER_HASH_BYTES[options.matchFinder];
  const isBinaryTree = options.matchFinder.startsWith('bt');

  const hashCount =
    hashTableSize(options.dictSize, hashBytes) +
    (hashBytes >= 3 ? HASH_2_SIZE : 0) +
    (hashBytes >= 4 ? HASH_3_SIZE : 0);
  const sonsCount = (options.dictSize + 1) * (isBinaryTree ? 2 : 1);
  const bufferSize =
    options.dictSize + Math.floor(options.dictSize / 2) + options.niceLen + MATCH_LEN_MAX;

  return (hashCount + sonsCount) * 4 + bufferSize;
}

function filterUsage(entry: FilterEntry, direction: CoderDirection): number {
  switch (entry.id) {
    case 'lzma1':
    case 'lzma2': {
      if (direction === 'decoder') {
        return entry.options.dictSize + LZMA_DECODER_STATE;
      }
      const chunk = entry.id === 'lzma2' ? LZMA2_CHUNK_BUFFER : 0;
      return lzEncoderUsage(entry.options) + LZMA_ENCODER_STATE + chunk;
    }
    case 'subblock':
      return direction === 'encoder'
        ? 2 * entry.options.subblockDataSize + SMALL_FILTER_USAGE
        : SMALL_FILTER_USAGE;
    default:
      return SMALL_FILTER_USAGE;
  }
}

export const defaultCostModel: MemoryCostModel = {
  estimate(chain, direction) {
    return chain.entries.reduce(
      (total, entry) => total + filterUsage(entry, direction),
      CHAIN_BASE_USAGE
    );
  },
};
