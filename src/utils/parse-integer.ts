/**
 * Unsigned integer parsing for option values.
 *
 * Accepts a decimal number with an optional multiplier suffix:
 * k/kB/M/MB/G/GB are powers of 1000, Ki/KiB/Mi/MiB/Gi/GiB powers of 1024.
 */

import { createInvalidIntegerError } from '../core/errors.js';
import { fail, ok, type Result } from '../core/result.js';

const MULTIPLIERS = new Map<string, number>([
  ['k', 1e3],
  ['kB', 1e3],
  ['M', 1e6],
  ['MB', 1e6],
  ['G', 1e9],
  ['GB', 1e9],
  ['Ki', 2 ** 10],
  ['KiB', 2 ** 10],
  ['Mi', 2 ** 20],
  ['MiB', 2 ** 20],
  ['Gi', 2 ** 30],
  ['GiB', 2 ** 30],
]);

export function parseUnsignedInteger(
  name: string,
  value: string,
  min: number,
  max: number
): Result<number> {
  const match = /^\s*(\d+)(.*)$/.exec(value);
  if (!match) {
    return fail(
      createInvalidIntegerError(`${value}: Value is not a non-negative decimal integer`, value)
    );
  }

  const [, digits = '', suffix = ''] = match;
  let multiplier = 1;
  if (suffix !== '') {
    const found = MULTIPLIERS.get(suffix);
    if (found === undefined) {
      return fail(createInvalidIntegerError(`${value}: Invalid multiplier suffix`, value));
    }
    multiplier = found;
  }

  const result = Number(digits) * multiplier;
  if (!Number.isSafeInteger(result) || result < min || result > max) {
    return fail(
      createInvalidIntegerError(
        `Value of the option \`${name}' must be in the range [${min}, ${max}]`,
        value
      )
    );
  }

  return ok(result);
}
