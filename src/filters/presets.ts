/**
 * LZMA presets
 *
 * Levels 1-3 use the fast mode with hash-chain match finders, 4-9 the normal
 * mode with a binary tree. Dictionary size doubles roughly every level.
 */

import type { LzmaOptions } from './types.js';

export const PRESET_MIN = 1;
export const PRESET_MAX = 9;
export const PRESET_DEFAULT = 7;

// log2 of the dictionary size, indexed by level
const DICT_POW2 = [18, 20, 21, 22, 22, 23, 23, 24, 25, 26] as const;
const FAST_DEPTHS = [4, 8, 24, 48] as const;

export function isPresetLevel(level: number): boolean {
  return Number.isInteger(level) && level >= PRESET_MIN && level <= PRESET_MAX;
}

/**
 * Canonical LZMA options for a preset level.
 * Throws on a level outside 1-9; callers validate user input first.
 */
export function lzmaPreset(level: number): LzmaOptions {
  if (!isPresetLevel(level)) {
    throw new RangeError(`LZMA preset level must be between ${PRESET_MIN} and ${PRESET_MAX}`);
  }

  const dictSize = 2 ** DICT_POW2[level];

  if (level <= 3) {
    return {
      dictSize,
      lc: 3,
      lp: 0,
      pb: 2,
      mode: 'fast',
      niceLen: level <= 1 ? 128 : 273,
      matchFinder: 'hc4',
      depth: FAST_DEPTHS[level],
    };
  }

  return {
    dictSize,
    lc: 3,
    lp: 0,
    pb: 2,
    mode: 'normal',
    niceLen: level === 4 ? 16 : level === 5 ? 32 : 64,
    matchFinder: 'bt4',
    depth: 0,
  };
}
