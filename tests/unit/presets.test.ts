import { describe, it, expect } from 'vitest';
import {
  PRESET_DEFAULT,
  PRESET_MAX,
  PRESET_MIN,
  isPresetLevel,
  lzmaPreset,
} from '../../src/filters/presets.js';

const MiB = 1024 * 1024;

describe('LZMA presets', () => {
  it('should default to level 7', () => {
    expect(PRESET_DEFAULT).toBe(7);
    expect(PRESET_MIN).toBe(1);
    expect(PRESET_MAX).toBe(9);
  });

  it('should use the fast mode up to level 3', () => {
    expect(lzmaPreset(1)).toEqual({
      dictSize: 1 * MiB,
      lc: 3,
      lp: 0,
      pb: 2,
      mode: 'fast',
      niceLen: 128,
      matchFinder: 'hc4',
      depth: 8,
    });
    expect(lzmaPreset(3).mode).toBe('fast');
    expect(lzmaPreset(3).niceLen).toBe(273);
  });

  it('should use the normal mode from level 4', () => {
    expect(lzmaPreset(6)).toEqual({
      dictSize: 8 * MiB,
      lc: 3,
      lp: 0,
      pb: 2,
      mode: 'normal',
      niceLen: 64,
      matchFinder: 'bt4',
      depth: 0,
    });
  });

  it('should grow the dictionary with the level', () => {
    const sizes = [1, 2, 3, 4, 5, 6, 7, 8, 9].map((level) => lzmaPreset(level).dictSize / MiB);
    expect(sizes).toEqual([1, 2, 4, 4, 8, 8, 16, 32, 64]);
  });

  it('should reject levels outside 1-9', () => {
    expect(() => lzmaPreset(0)).toThrow(RangeError);
    expect(() => lzmaPreset(10)).toThrow(RangeError);
    expect(isPresetLevel(2.5)).toBe(false);
    expect(isPresetLevel(9)).toBe(true);
  });

  it('should return a fresh object each time', () => {
    const first = lzmaPreset(5);
    first.dictSize = 4096;
    expect(lzmaPreset(5).dictSize).toBe(8 * MiB);
  });
});
