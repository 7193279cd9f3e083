/**
 * Core error definitions
 *
 * Every failure the argument pipeline can detect is an XzoptError carrying a
 * stable code. Nothing below the CLI driver terminates the process; steps
 * return a Result (see ./result.ts) and the driver decides what to do.
 */

export class XzoptError extends Error {
  constructor(
    message: string,
    public code: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'XzoptError';
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error codes for programmatic handling
 */
export const ErrorCodes = {
  // Malformed input (1000-1999)
  UNKNOWN_OPTION: 'E1000',
  MISSING_ARGUMENT: 'E1001',
  INVALID_INTEGER: 'E1002',
  INVALID_SUFFIX: 'E1003',
  UNKNOWN_FORMAT: 'E1004',
  UNKNOWN_CHECK: 'E1005',
  INVALID_FILTER_OPTIONS: 'E1006',
  FILES_LIST_CONFLICT: 'E1007',

  // Resource exhaustion (2000-2999)
  TOO_MANY_FILTERS: 'E2000',
  TOO_MANY_ARGUMENTS: 'E2001',

  // Infeasible configuration (3000-3999)
  UNSUPPORTED_FILTER_CHAIN: 'E3000',
  MEMORY_LIMIT_TOO_SMALL: 'E3001',

  // I/O (4000-4999)
  FILES_LIST_OPEN_FAILED: 'E4000',

  // Internal (5000-5999)
  INTERNAL_ERROR: 'E5000',
  CONFIG_INVALID: 'E5001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// =============================================================================
// FACTORIES
// =============================================================================

export function createUnknownOptionError(token: string): XzoptError {
  return new XzoptError(`unrecognized option '${token}'`, ErrorCodes.UNKNOWN_OPTION, { token });
}

export function createMissingArgumentError(message: string): XzoptError {
  return new XzoptError(message, ErrorCodes.MISSING_ARGUMENT);
}

export function createInvalidIntegerError(message: string, value: string): XzoptError {
  return new XzoptError(message, ErrorCodes.INVALID_INTEGER, { value });
}

export function createInvalidSuffixError(suffix: string): XzoptError {
  return new XzoptError(`${suffix}: Invalid filename suffix`, ErrorCodes.INVALID_SUFFIX, {
    suffix,
  });
}

export function createUnknownFormatError(name: string): XzoptError {
  return new XzoptError(`${name}: Unknown file format type`, ErrorCodes.UNKNOWN_FORMAT, { name });
}

export function createUnknownCheckError(name: string): XzoptError {
  return new XzoptError(`${name}: Unknown integrity check type`, ErrorCodes.UNKNOWN_CHECK, {
    name,
  });
}

export function createFilterOptionsError(
  message: string,
  context?: Record<string, unknown>
): XzoptError {
  return new XzoptError(message, ErrorCodes.INVALID_FILTER_OPTIONS, context);
}

export function createFilesListConflictError(): XzoptError {
  return new XzoptError(
    "Only one file can be specified with `--files' or `--files0'.",
    ErrorCodes.FILES_LIST_CONFLICT
  );
}

export function createTooManyFiltersError(max: number): XzoptError {
  return new XzoptError('Maximum number of filters is seven', ErrorCodes.TOO_MANY_FILTERS, {
    max,
  });
}

export function createTooManyArgumentsError(variable: string, max: number): XzoptError {
  return new XzoptError(
    `The environment variable ${variable} contains too many arguments`,
    ErrorCodes.TOO_MANY_ARGUMENTS,
    { variable, max }
  );
}

export function createUnsupportedChainError(): XzoptError {
  return new XzoptError(
    'With --format=lzma only the LZMA1 filter is supported',
    ErrorCodes.UNSUPPORTED_FILTER_CHAIN
  );
}

export function createMemoryLimitError(
  explicit: boolean,
  context: Record<string, unknown>
): XzoptError {
  const message = explicit
    ? 'Memory usage limit is too small for the given filter setup'
    : 'Memory usage limit is too small for any internal filter preset';
  return new XzoptError(message, ErrorCodes.MEMORY_LIMIT_TOO_SMALL, context);
}

export function createFilesListOpenError(path: string, cause: unknown): XzoptError {
  const reason = describeSystemError(cause);
  const error = new XzoptError(`${path}: ${reason}`, ErrorCodes.FILES_LIST_OPEN_FAILED, {
    path,
  });
  error.cause = cause;
  return error;
}

export function createInternalError(detail: string): XzoptError {
  return new XzoptError(`Internal error (bug): ${detail}`, ErrorCodes.INTERNAL_ERROR);
}

/**
 * Turn a thrown fs error into the short system text ("No such file or directory").
 */
export function describeSystemError(cause: unknown): string {
  if (cause instanceof Error) {
    // node prefixes the text with "CODE: " and appends the syscall and path
    const match = /^[A-Z]+: ([^,]+)/.exec(cause.message);
    return match?.[1] ?? cause.message;
  }
  return String(cause);
}
