/**
 * Compression Settings Resolver
 *
 * Turns the accumulated filter chain and preset into the final encoder
 * setup. A chain the user asked for is taken as-is and must fit the memory
 * budget; the default preset is lowered step by step until it fits. Whatever
 * memory is left decides how many coder threads may run side by side.
 */

import {
  createInternalError,
  createMemoryLimitError,
  createUnsupportedChainError,
} from '../core/errors.js';
import { fail, ok, type Result } from '../core/result.js';
import type {
  CompressionSettings,
  ContainerFormat,
  OperationMode,
  Preset,
} from '../core/types.js';
import { isLegacyCompatible, terminateChain } from '../filters/chain.js';
import {
  defaultCostModel,
  type CoderDirection,
  type MemoryCostModel,
} from '../filters/memusage.js';
import { PRESET_MIN, lzmaPreset } from '../filters/presets.js';
import type { FilterChain, FilterEntry, TerminatedFilterChain } from '../filters/types.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('compression-settings');

export interface CompressionInput {
  mode: OperationMode;
  format: ContainerFormat;
  filters: FilterChain;
  preset: Preset;
  /** Bytes */
  memoryBudget: number;
  threadsRequested: number;
}

/**
 * The single LZMA filter a preset level stands for.
 */
export function presetFilter(format: ContainerFormat, level: number): FilterEntry {
  return { id: format === 'lzma' ? 'lzma1' : 'lzma2', options: lzmaPreset(level) };
}

/**
 * Threads that fit in the budget, never fewer than one and never more than
 * requested.
 */
export function capThreads(requested: number, budget: number, usage: number): number {
  const threadLimit = Math.max(1, Math.floor(budget / usage));
  return Math.min(requested, threadLimit);
}

/**
 * Resolve the final chain, preset, memory estimate and thread count.
 * Runs when compressing, or for raw streams in any mode.
 */
export function resolveCompressionSettings(
  input: CompressionInput,
  costModel: MemoryCostModel = defaultCostModel
): Result<CompressionSettings> {
  const synthesized = input.filters.length === 0;
  const buildChain = (level: number): TerminatedFilterChain =>
    terminateChain(synthesized ? [presetFilter(input.format, level)] : input.filters);

  let preset = input.preset;
  let chain = buildChain(preset.level);

  if (input.format === 'lzma' && !isLegacyCompatible(chain.entries)) {
    return fail(createUnsupportedChainError());
  }

  // raw streams can be decoded too, and then the decoder is what runs
  const direction: CoderDirection = input.mode === 'compress' ? 'encoder' : 'decoder';
  let memoryUsage = costModel.estimate(chain, direction);

  if (preset.isDefault) {
    const requestedLevel = preset.level;

    while (memoryUsage > input.memoryBudget) {
      if (preset.level === PRESET_MIN) {
        return fail(
          createMemoryLimitError(false, { memoryUsage, memoryBudget: input.memoryBudget })
        );
      }

      preset = { level: preset.level - 1, isDefault: true };
      chain = buildChain(preset.level);
      memoryUsage = costModel.estimate(chain, direction);
      logger.debug({ level: preset.level, memoryUsage }, 'trying lower preset');
    }

    if (preset.level !== requestedLevel) {
      logger.info(
        { from: requestedLevel, to: preset.level, memoryBudget: input.memoryBudget },
        'lowered compression preset to fit memory limit'
      );
      if (input.format === 'raw') {
        // presets may change between releases, raw streams carry no settings
        logger.warn({ level: preset.level }, 'raw stream compressed with an adjusted preset');
      }
    }
  } else if (memoryUsage > input.memoryBudget) {
    return fail(createMemoryLimitError(true, { memoryUsage, memoryBudget: input.memoryBudget }));
  }

  if (memoryUsage <= 0) {
    return fail(createInternalError(`memory usage estimate is ${memoryUsage}`));
  }

  const threadsEffective = capThreads(input.threadsRequested, input.memoryBudget, memoryUsage);
  if (threadsEffective < input.threadsRequested) {
    logger.debug(
      { requested: input.threadsRequested, effective: threadsEffective, memoryUsage },
      'reduced thread count to fit memory limit'
    );
  }

  return ok({ chain, preset, memoryUsage, threadsEffective });
}
