/**
 * Invocation-Name Defaulter
 *
 * The same program is installed under several names (unxz, xzcat, lzma,
 * unlzma, lzcat). The name it was called by picks defaults that flags can
 * still override.
 */

import { basename } from 'node:path';
import type { ArgumentState } from '../core/types.js';

export function applyInvocationName(
  state: ArgumentState,
  argv0: string | undefined
): ArgumentState {
  const name = argv0 ? basename(argv0) : '';
  if (name === '') return state;

  let next = state;

  if (name.includes('lz')) {
    next = { ...next, compressFormat: 'lzma' };
  }

  if (name.includes('cat')) {
    next = { ...next, config: { ...next.config, mode: 'decompress', stdout: true } };
  } else if (name.includes('un')) {
    next = { ...next, config: { ...next.config, mode: 'decompress' } };
  }

  return next;
}
