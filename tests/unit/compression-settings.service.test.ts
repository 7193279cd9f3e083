/**
 * Compression Settings Resolver tests
 *
 * The cost model is replaced with scripted estimates so the degradation and
 * thread logic can be checked independently of the default estimator.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  capThreads,
  presetFilter,
  resolveCompressionSettings,
  type CompressionInput,
} from '../../src/services/compression-settings.service.js';
import type { MemoryCostModel } from '../../src/filters/memusage.js';
import { lzmaPreset } from '../../src/filters/presets.js';
import { ErrorCodes } from '../../src/core/errors.js';

function scriptedModel(...usages: number[]) {
  const estimate = vi.fn<MemoryCostModel['estimate']>();
  for (const usage of usages) estimate.mockReturnValueOnce(usage);
  // anything past the script repeats the last value
  estimate.mockReturnValue(usages[usages.length - 1]);
  return { model: { estimate }, estimate };
}

function input(overrides: Partial<CompressionInput> = {}): CompressionInput {
  return {
    mode: 'compress',
    format: 'xz',
    filters: [],
    preset: { level: 7, isDefault: true },
    memoryBudget: 1000,
    threadsRequested: 1,
    ...overrides,
  };
}

describe('capThreads', () => {
  it('should keep the request when memory allows', () => {
    expect(capThreads(2, 1000, 100)).toBe(2);
  });

  it('should cap to what fits in the budget', () => {
    expect(capThreads(8, 1000, 300)).toBe(3);
  });

  it('should never go below one thread', () => {
    expect(capThreads(8, 100, 300)).toBe(1);
  });
});

describe('presetFilter', () => {
  it('should use LZMA1 for the legacy format and LZMA2 otherwise', () => {
    expect(presetFilter('lzma', 3)).toEqual({ id: 'lzma1', options: lzmaPreset(3) });
    expect(presetFilter('xz', 3)).toEqual({ id: 'lzma2', options: lzmaPreset(3) });
    expect(presetFilter('raw', 3)).toEqual({ id: 'lzma2', options: lzmaPreset(3) });
  });
});

describe('resolveCompressionSettings', () => {
  it('should synthesize the preset filter for an empty chain', () => {
    const { model } = scriptedModel(400);
    const result = resolveCompressionSettings(input(), model);

    expect(result).toEqual({
      success: true,
      value: {
        chain: { entries: [{ id: 'lzma2', options: lzmaPreset(7) }], terminator: 'end' },
        preset: { level: 7, isDefault: true },
        memoryUsage: 400,
        threadsEffective: 1,
      },
    });
  });

  it('should synthesize one canonical filter for every preset level', () => {
    for (let level = 1; level <= 9; level++) {
      for (const isDefault of [true, false]) {
        const result = resolveCompressionSettings(
          input({ preset: { level, isDefault }, memoryBudget: 2 ** 40 })
        );

        expect(result.success).toBe(true);
        if (!result.success) return;
        expect(result.value.preset).toEqual({ level, isDefault });
        expect(result.value.chain).toEqual({
          entries: [{ id: 'lzma2', options: lzmaPreset(level) }],
          terminator: 'end',
        });
      }

      const legacy = resolveCompressionSettings(
        input({ format: 'lzma', preset: { level, isDefault: false }, memoryBudget: 2 ** 40 })
      );
      expect(legacy.success && legacy.value.chain.entries).toEqual([
        { id: 'lzma1', options: lzmaPreset(level) },
      ]);
    }
  });

  it('should keep a user chain as given', () => {
    const { model } = scriptedModel(400);
    const filters = [{ id: 'x86' as const }, { id: 'lzma2' as const, options: lzmaPreset(2) }];
    const result = resolveCompressionSettings(
      input({ filters, preset: { level: 7, isDefault: false } }),
      model
    );

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value.chain.entries).toEqual(filters);
  });

  it('should use the encoder estimate when compressing', () => {
    const { model, estimate } = scriptedModel(400);
    resolveCompressionSettings(input(), model);
    expect(estimate).toHaveBeenCalledWith(expect.anything(), 'encoder');
  });

  it('should use the decoder estimate for raw decompression', () => {
    const { model, estimate } = scriptedModel(5000, 2000, 900);
    const result = resolveCompressionSettings(input({ mode: 'decompress', format: 'raw' }), model);

    expect(result.success).toBe(true);
    expect(estimate).toHaveBeenCalledTimes(3);
    for (const call of estimate.mock.calls) {
      expect(call[1]).toBe('decoder');
    }
  });

  it('should lower the default preset until it fits', () => {
    const { model, estimate } = scriptedModel(1500, 1200, 1000);
    const result = resolveCompressionSettings(input(), model);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value.preset).toEqual({ level: 5, isDefault: true });
    expect(result.value.memoryUsage).toBe(1000);
    expect(result.value.chain.entries).toEqual([{ id: 'lzma2', options: lzmaPreset(5) }]);
    expect(estimate).toHaveBeenCalledTimes(3);
  });

  it('should fail when even preset 1 does not fit', () => {
    const { model, estimate } = scriptedModel(2000);
    const result = resolveCompressionSettings(input(), model);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe(ErrorCodes.MEMORY_LIMIT_TOO_SMALL);
    expect(result.error.message).toBe(
      'Memory usage limit is too small for any internal filter preset'
    );
    // levels 7 down to 1
    expect(estimate).toHaveBeenCalledTimes(7);
  });

  it('should not lower an explicit preset', () => {
    const { model, estimate } = scriptedModel(2000, 100);
    const result = resolveCompressionSettings(
      input({ preset: { level: 7, isDefault: false } }),
      model
    );

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe(ErrorCodes.MEMORY_LIMIT_TOO_SMALL);
    expect(result.error.message).toBe(
      'Memory usage limit is too small for the given filter setup'
    );
    expect(estimate).toHaveBeenCalledTimes(1);
  });

  it('should accept usage exactly at the budget', () => {
    const { model } = scriptedModel(1000);
    const result = resolveCompressionSettings(
      input({ preset: { level: 9, isDefault: false }, threadsRequested: 4 }),
      model
    );

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value.threadsEffective).toBe(1);
  });

  it('should cap threads by the remaining budget', () => {
    const { model } = scriptedModel(300);
    const result = resolveCompressionSettings(input({ threadsRequested: 8 }), model);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value.threadsEffective).toBe(3);
  });

  it('should require exactly one LZMA1 filter for the legacy format', () => {
    const { model, estimate } = scriptedModel(100);
    const result = resolveCompressionSettings(
      input({
        format: 'lzma',
        filters: [{ id: 'lzma2', options: lzmaPreset(7) }],
        preset: { level: 7, isDefault: false },
      }),
      model
    );

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe(ErrorCodes.UNSUPPORTED_FILTER_CHAIN);
    expect(result.error.message).toBe('With --format=lzma only the LZMA1 filter is supported');
    expect(estimate).not.toHaveBeenCalled();
  });

  it('should synthesize LZMA1 for the legacy format', () => {
    const { model } = scriptedModel(100);
    const result = resolveCompressionSettings(input({ format: 'lzma' }), model);

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.value.chain.entries).toEqual([{ id: 'lzma1', options: lzmaPreset(7) }]);
  });

  it('should report a non-positive estimate as an internal error', () => {
    const { model } = scriptedModel(0);
    const result = resolveCompressionSettings(input(), model);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe(ErrorCodes.INTERNAL_ERROR);
    expect(result.error.message).toBe('Internal error (bug): memory usage estimate is 0');
  });
});
