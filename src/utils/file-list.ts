/**
 * File-list reading for --files and --files0
 */

import { closeSync, readFileSync } from 'node:fs';
import type { FilesListSource } from '../core/types.js';

const STDIN_FD = 0;

/**
 * Split file-list contents into names. A separator at the very end does not
 * start another (empty) name.
 */
export function splitFileList(contents: string, separator: FilesListSource['separator']): string[] {
  if (contents === '') return [];

  const names = contents.split(separator);
  if (names[names.length - 1] === '') names.pop();
  return names;
}

/**
 * Read the whole file-list source and return the names in it. A named file
 * is closed afterwards; standard input stays open.
 */
export function readFileList(source: FilesListSource): string[] {
  if (source.kind === 'stdin') {
    return splitFileList(readFileSync(STDIN_FD, 'utf-8'), source.separator);
  }

  try {
    return splitFileList(readFileSync(source.fd, 'utf-8'), source.separator);
  } finally {
    closeSync(source.fd);
  }
}
