/**
 * Unit tests for error utilities
 */

import { describe, it, expect } from 'vitest';
import {
  XzoptError,
  ErrorCodes,
  createFilesListOpenError,
  createInternalError,
  createInvalidSuffixError,
  createMemoryLimitError,
  createTooManyArgumentsError,
  createUnknownOptionError,
  describeSystemError,
} from '../../src/core/errors.js';
import { fail, ok } from '../../src/core/result.js';

describe('XzoptError', () => {
  it('should create error with message and code', () => {
    const error = new XzoptError('Test error', ErrorCodes.UNKNOWN_FORMAT);
    expect(error.message).toBe('Test error');
    expect(error.code).toBe('E1004');
    expect(error.name).toBe('XzoptError');
    expect(error).toBeInstanceOf(Error);
  });

  it('should serialize to JSON correctly', () => {
    const error = new XzoptError('Test error', ErrorCodes.INVALID_SUFFIX, { suffix: '/' });
    expect(error.toJSON()).toEqual({
      error: 'Test error',
      code: 'E1003',
      context: { suffix: '/' },
    });
  });
});

describe('error factories', () => {
  it('should quote unknown options', () => {
    const error = createUnknownOptionError('--frobnicate');
    expect(error.message).toBe("unrecognized option '--frobnicate'");
    expect(error.context).toEqual({ token: '--frobnicate' });
  });

  it('should put the suffix first', () => {
    expect(createInvalidSuffixError('.a/b').message).toBe('.a/b: Invalid filename suffix');
  });

  it('should name the environment variable', () => {
    const error = createTooManyArgumentsError('XZ_OPT', 10);
    expect(error.message).toBe('The environment variable XZ_OPT contains too many arguments');
    expect(error.code).toBe(ErrorCodes.TOO_MANY_ARGUMENTS);
  });

  it('should word memory errors by whether the setup was explicit', () => {
    expect(createMemoryLimitError(true, {}).message).toBe(
      'Memory usage limit is too small for the given filter setup'
    );
    expect(createMemoryLimitError(false, {}).message).toBe(
      'Memory usage limit is too small for any internal filter preset'
    );
  });

  it('should mark internal errors as bugs', () => {
    expect(createInternalError('oops').message).toBe('Internal error (bug): oops');
  });

  it('should keep the cause of open failures', () => {
    const cause = new Error("EACCES: permission denied, open 'list'");
    const error = createFilesListOpenError('list', cause);
    expect(error.message).toBe('list: permission denied');
    expect(error.cause).toBe(cause);
    expect(error.code).toBe(ErrorCodes.FILES_LIST_OPEN_FAILED);
  });
});

describe('describeSystemError', () => {
  it('should strip the code prefix and the syscall details', () => {
    expect(describeSystemError(new Error("ENOENT: no such file or directory, open 'x'"))).toBe(
      'no such file or directory'
    );
  });

  it('should keep other messages as they are', () => {
    expect(describeSystemError(new Error('something else'))).toBe('something else');
    expect(describeSystemError('plain')).toBe('plain');
  });
});

describe('Result helpers', () => {
  it('should wrap values and errors', () => {
    expect(ok(3)).toEqual({ success: true, value: 3 });
    const error = createInternalError('x');
    expect(fail(error)).toEqual({ success: false, error });
  });
});
