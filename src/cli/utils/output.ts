/**
 * CLI Output Formatting
 *
 * The resolved invocation is printed as JSON so that scripts (and the
 * file-processing stage) can consume it directly.
 */

import { Verbosity, type FilesListSource, type ResolvedInvocation } from '../../core/types.js';

export function formatOutput(result: unknown): string {
  return JSON.stringify(result, null, 2);
}

function describeFilesList(source: FilesListSource): Record<string, string> {
  const separator = source.separator === '\0' ? 'null' : 'newline';
  // the descriptor only means something inside this process
  return source.kind === 'file'
    ? { kind: source.kind, path: source.path, separator }
    : { kind: source.kind, separator };
}

/**
 * Plain-data view of an invocation, ready for JSON.
 */
export function describeInvocation(invocation: ResolvedInvocation): Record<string, unknown> {
  const { filesList, verbosity, ...config } = invocation.config;

  return {
    config: {
      ...config,
      verbosity: Verbosity[verbosity].toLowerCase(),
      ...(filesList ? { filesList: describeFilesList(filesList) } : {}),
    },
    ...(invocation.compression ? { compression: invocation.compression } : {}),
    files: invocation.files,
  };
}
