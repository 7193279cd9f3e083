/**
 * Filter option strings
 *
 * `--lzma2=preset=6,dict=32MiB,lc=4` style values: comma separated
 * `name=value` pairs. Integer values go through parseUnsignedInteger, so the
 * usual multiplier suffixes work. Empty pairs are skipped.
 */

import { createFilterOptionsError, type XzoptError } from '../core/errors.js';
import { fail, ok, type Result } from '../core/result.js';
import { parseUnsignedInteger } from '../utils/parse-integer.js';
import { PRESET_DEFAULT, PRESET_MAX, PRESET_MIN, lzmaPreset } from './presets.js';
import type {
  DeltaOptions,
  LzmaMode,
  LzmaOptions,
  MatchFinder,
  SubblockOptions,
} from './types.js';

// =============================================================================
// LIMITS
// =============================================================================

export const LZMA_DICT_SIZE_MIN = 4096;
export const LZMA_DICT_SIZE_MAX = 2 ** 30 + 2 ** 29;
export const LZMA_LCLP_MAX = 4;
export const LZMA_PB_MAX = 4;
export const LZMA_NICE_LEN_MIN = 2;
export const LZMA_NICE_LEN_MAX = 273;
export const LZMA_DEPTH_MAX = 2 ** 32 - 1;

export const DELTA_DISTANCE_MIN = 1;
export const DELTA_DISTANCE_MAX = 256;

export const SUBBLOCK_DATA_SIZE_MIN = 1;
export const SUBBLOCK_DATA_SIZE_MAX = 2 ** 28;
export const SUBBLOCK_DATA_SIZE_DEFAULT = 4096;
export const SUBBLOCK_RLE_OFF = 0;
export const SUBBLOCK_RLE_MAX = 256;
export const SUBBLOCK_ALIGNMENT_MIN = 1;
export const SUBBLOCK_ALIGNMENT_MAX = 32;
export const SUBBLOCK_ALIGNMENT_DEFAULT = 4;

const LZMA_MODES: readonly LzmaMode[] = ['fast', 'normal'];
const MATCH_FINDERS: readonly MatchFinder[] = ['hc3', 'hc4', 'bt2', 'bt3', 'bt4'];

/** Bytes hashed by each match finder; nice must be at least this long. */
export const MATCH_FINDER_HASH_BYTES: Record<MatchFinder, number> = {
  hc3: 3,
  hc4: 4,
  bt2: 2,
  bt3: 3,
  bt4: 4,
};

// =============================================================================
// PAIR SPLITTING
// =============================================================================

export interface OptionPair {
  name: string;
  value: string;
}

export function splitOptionPairs(raw: string): Result<OptionPair[]> {
  const pairs: OptionPair[] = [];

  for (const part of raw.split(',')) {
    if (part === '') continue;

    const eq = part.indexOf('=');
    if (eq === -1) {
      return fail(
        createFilterOptionsError(
          `${raw}: Options must be \`name=value' pairs separated with commas`,
          { raw }
        )
      );
    }
    pairs.push({ name: part.slice(0, eq), value: part.slice(eq + 1) });
  }

  return ok(pairs);
}

function invalidName(name: string): XzoptError {
  return createFilterOptionsError(`${name}: Invalid option name`, { name });
}

function invalidValue(name: string, value: string): XzoptError {
  return createFilterOptionsError(`${value}: Invalid option value`, { name, value });
}

function pickValue<T extends string>(
  name: string,
  value: string,
  allowed: readonly T[]
): Result<T> {
  const found = allowed.find((candidate) => candidate === value);
  return found === undefined ? fail(invalidValue(name, value)) : ok(found);
}

// =============================================================================
// PER-FILTER PARSERS
// =============================================================================

export function parseSubblockOptions(raw: string | undefined): Result<SubblockOptions> {
  const options: SubblockOptions = {
    subblockDataSize: SUBBLOCK_DATA_SIZE_DEFAULT,
    rle: SUBBLOCK_RLE_OFF,
    alignment: SUBBLOCK_ALIGNMENT_DEFAULT,
  };
  if (raw === undefined) return ok(options);

  const pairs = splitOptionPairs(raw);
  if (!pairs.success) return pairs;

  for (const { name, value } of pairs.value) {
    let parsed: Result<number>;
    switch (name) {
      case 'size':
        parsed = parseUnsignedInteger(name, value, SUBBLOCK_DATA_SIZE_MIN, SUBBLOCK_DATA_SIZE_MAX);
        if (!parsed.success) return parsed;
        options.subblockDataSize = parsed.value;
        break;
      case 'rle':
        parsed = parseUnsignedInteger(name, value, SUBBLOCK_RLE_OFF, SUBBLOCK_RLE_MAX);
        if (!parsed.success) return parsed;
        options.rle = parsed.value;
        break;
      case 'align':
        parsed = parseUnsignedInteger(name, value, SUBBLOCK_ALIGNMENT_MIN, SUBBLOCK_ALIGNMENT_MAX);
        if (!parsed.success) return parsed;
        options.alignment = parsed.value;
        break;
      default:
        return fail(invalidName(name));
    }
  }

  return ok(options);
}

export function parseDeltaOptions(raw: string | undefined): Result<DeltaOptions> {
  const options: DeltaOptions = { type: 'byte', distance: DELTA_DISTANCE_MIN };
  if (raw === undefined) return ok(options);

  const pairs = splitOptionPairs(raw);
  if (!pairs.success) return pairs;

  for (const { name, value } of pairs.value) {
    if (name !== 'dist') return fail(invalidName(name));

    const parsed = parseUnsignedInteger(name, value, DELTA_DISTANCE_MIN, DELTA_DISTANCE_MAX);
    if (!parsed.success) return parsed;
    options.distance = parsed.value;
  }

  return ok(options);
}

/**
 * LZMA1/LZMA2 options. Starts from the default preset; `preset=N` resets
 * every field to preset N at the point where it appears.
 */
export function parseLzmaOptions(raw: string | undefined): Result<LzmaOptions> {
  let options = lzmaPreset(PRESET_DEFAULT);
  if (raw === undefined) return ok(options);

  const pairs = splitOptionPairs(raw);
  if (!pairs.success) return pairs;

  for (const { name, value } of pairs.value) {
    switch (name) {
      case 'preset': {
        const level = parseUnsignedInteger(name, value, PRESET_MIN, PRESET_MAX);
        if (!level.success) return level;
        options = lzmaPreset(level.value);
        break;
      }
      case 'dict': {
        const dict = parseUnsignedInteger(name, value, LZMA_DICT_SIZE_MIN, LZMA_DICT_SIZE_MAX);
        if (!dict.success) return dict;
        options.dictSize = dict.value;
        break;
      }
      case 'lc':
      case 'lp': {
        const bits = parseUnsignedInteger(name, value, 0, LZMA_LCLP_MAX);
        if (!bits.success) return bits;
        options[name] = bits.value;
        break;
      }
      case 'pb': {
        const bits = parseUnsignedInteger(name, value, 0, LZMA_PB_MAX);
        if (!bits.success) return bits;
        options.pb = bits.value;
        break;
      }
      case 'mode': {
        const mode = pickValue(name, value, LZMA_MODES);
        if (!mode.success) return mode;
        options.mode = mode.value;
        break;
      }
      case 'nice': {
        const nice = parseUnsignedInteger(name, value, LZMA_NICE_LEN_MIN, LZMA_NICE_LEN_MAX);
        if (!nice.success) return nice;
        options.niceLen = nice.value;
        break;
      }
      case 'mf': {
        const mf = pickValue(name, value, MATCH_FINDERS);
        if (!mf.success) return mf;
        options.matchFinder = mf.value;
        break;
      }
      case 'depth': {
        const depth = parseUnsignedInteger(name, value, 0, LZMA_DEPTH_MAX);
        if (!depth.success) return depth;
        options.depth = depth.value;
        break;
      }
      default:
        return fail(invalidName(name));
    }
  }

  if (options.lc + options.lp > LZMA_LCLP_MAX) {
    return fail(
      createFilterOptionsError('The sum of lc and lp must be at maximum of 4', {
        lc: options.lc,
        lp: options.lp,
      })
    );
  }

  const niceMin = MATCH_FINDER_HASH_BYTES[options.matchFinder];
  if (options.niceLen < niceMin) {
    return fail(
      createFilterOptionsError(`The selected match finder requires at least nice=${niceMin}`, {
        matchFinder: options.matchFinder,
        niceLen: options.niceLen,
      })
    );
  }

  return ok(options);
}
