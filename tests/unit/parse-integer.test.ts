import { describe, it, expect } from 'vitest';
import { parseUnsignedInteger } from '../../src/utils/parse-integer.js';
import { ErrorCodes } from '../../src/core/errors.js';

describe('parseUnsignedInteger', () => {
  it('should parse plain decimal numbers', () => {
    expect(parseUnsignedInteger('memory', '123', 1, 1000)).toEqual({ success: true, value: 123 });
  });

  it('should allow leading whitespace', () => {
    expect(parseUnsignedInteger('memory', '  42', 1, 1000)).toEqual({ success: true, value: 42 });
  });

  it('should apply decimal multipliers', () => {
    const max = Number.MAX_SAFE_INTEGER;
    expect(parseUnsignedInteger('memory', '2k', 1, max)).toEqual({ success: true, value: 2000 });
    expect(parseUnsignedInteger('memory', '3MB', 1, max)).toEqual({
      success: true,
      value: 3_000_000,
    });
    expect(parseUnsignedInteger('memory', '1G', 1, max)).toEqual({
      success: true,
      value: 1_000_000_000,
    });
  });

  it('should apply binary multipliers', () => {
    const max = Number.MAX_SAFE_INTEGER;
    expect(parseUnsignedInteger('dict', '4KiB', 1, max)).toEqual({ success: true, value: 4096 });
    expect(parseUnsignedInteger('dict', '16Mi', 1, max)).toEqual({
      success: true,
      value: 16777216,
    });
    expect(parseUnsignedInteger('dict', '1GiB', 1, max)).toEqual({
      success: true,
      value: 1073741824,
    });
  });

  it('should reject values that do not start with a digit', () => {
    const result = parseUnsignedInteger('threads', 'abc', 1, 10);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe(ErrorCodes.INVALID_INTEGER);
    expect(result.error.message).toBe('abc: Value is not a non-negative decimal integer');
  });

  it('should reject negative numbers', () => {
    const result = parseUnsignedInteger('threads', '-1', 1, 10);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe('-1: Value is not a non-negative decimal integer');
  });

  it('should reject unknown suffixes', () => {
    const result = parseUnsignedInteger('memory', '5XB', 1, 1000);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe('5XB: Invalid multiplier suffix');
  });

  it('should reject values outside the range', () => {
    const low = parseUnsignedInteger('threads', '0', 1, 10);
    const high = parseUnsignedInteger('threads', '11', 1, 10);

    for (const result of [low, high]) {
      expect(result.success).toBe(false);
      if (result.success) continue;
      expect(result.error.message).toBe(
        "Value of the option `threads' must be in the range [1, 10]"
      );
    }
  });

  it('should accept both ends of the range', () => {
    expect(parseUnsignedInteger('pb', '0', 0, 4)).toEqual({ success: true, value: 0 });
    expect(parseUnsignedInteger('pb', '4', 0, 4)).toEqual({ success: true, value: 4 });
  });

  it('should reject values beyond the safe integer range', () => {
    const result = parseUnsignedInteger('memory', '9999999999GiB', 1, Number.MAX_SAFE_INTEGER);
    expect(result.success).toBe(false);
  });
});
