/**
 * Argument pipeline
 *
 * Program name defaults, then XZ_OPT, then the command line, then the
 * compression settings. The result is everything the file-processing stage
 * needs to start; nothing here terminates the process.
 */

import { openSync } from 'node:fs';
import { getDefaultMemoryBudget } from '../config/index.js';
import { createFilesListOpenError } from '../core/errors.js';
import { fail, ok, type Result } from '../core/result.js';
import {
  Verbosity,
  type ArgumentState,
  type FilesListRequest,
  type FilesListSource,
  type ResolvedInvocation,
  type RunConfiguration,
} from '../core/types.js';
import { EMPTY_CHAIN } from '../filters/chain.js';
import { defaultCostModel, type MemoryCostModel } from '../filters/memusage.js';
import { PRESET_DEFAULT } from '../filters/presets.js';
import { resolveCompressionSettings } from '../services/compression-settings.service.js';
import { setLogLevel, verbosityToLogLevel } from '../utils/logger.js';
import { applyEnvironmentArguments } from './environment.js';
import { interpretArguments } from './interpreter.js';
import { applyInvocationName } from './invocation.js';

export type ParseOutcome =
  | { action: 'run'; invocation: ResolvedInvocation }
  | { action: 'help' }
  | { action: 'version' };

/**
 * Open a file-list source for reading and return its descriptor.
 * Throws the system error when the file cannot be opened.
 */
export type OpenFile = (path: string) => number;

export interface ParseOptions {
  /** Defaults to process.env */
  env?: Record<string, string | undefined>;
  costModel?: MemoryCostModel;
  /** Opens --files/--files0 sources; defaults to fs.openSync */
  openFile?: OpenFile;
  /** Memory limit before -M; defaults to the configured limit */
  memoryBudget?: number;
}

const DEFAULT_PROGRAM_NAME = 'xzopt';

export function createDefaultState(memoryBudget: number): ArgumentState {
  return {
    config: {
      mode: 'compress',
      format: 'auto',
      check: 'crc64',
      verbosity: Verbosity.Warning,
      stdout: false,
      force: false,
      keepOriginal: false,
      preserveName: false,
      memoryBudget,
      threadsRequested: 1,
    },
    filters: EMPTY_CHAIN,
    preset: { level: PRESET_DEFAULT, isDefault: true },
    compressFormat: 'xz',
  };
}

/**
 * Adjustments that depend on the combination of flags, not their order.
 */
export function normalizeConfiguration(state: ArgumentState): RunConfiguration {
  let config = state.config;

  // the source is never removed when the output does not go to a file
  if (config.stdout || config.mode === 'test') {
    config = { ...config, keepOriginal: true, stdout: true };
  }

  if (config.mode === 'compress' && config.format === 'auto') {
    config = { ...config, format: state.compressFormat };
  }

  return config;
}

function openFilesList(request: FilesListRequest, openFile: OpenFile): Result<FilesListSource> {
  const { path, separator } = request;
  if (path === undefined) {
    return ok({ kind: 'stdin', separator });
  }

  try {
    return ok({ kind: 'file', path, fd: openFile(path), separator });
  } catch (error) {
    return fail(createFilesListOpenError(path, error));
  }
}

/**
 * Parse a full argument vector, program name first. A file-list source is
 * opened last, so no descriptor is left behind by a failed parse.
 *
 * Without `memoryBudget` the configured default is read, which throws
 * CONFIG_INVALID for out-of-range XZOPT_* variables.
 */
export function parseArguments(
  argv: readonly string[],
  options: ParseOptions = {}
): Result<ParseOutcome> {
  const env = options.env ?? process.env;
  const openFile = options.openFile ?? ((path: string) => openSync(path, 'r'));
  const programName = argv[0] ?? DEFAULT_PROGRAM_NAME;

  let state = createDefaultState(options.memoryBudget ?? getDefaultMemoryBudget());
  state = applyInvocationName(state, argv[0]);

  const fromEnvironment = applyEnvironmentArguments(state, env, programName);
  if (!fromEnvironment.success) return fromEnvironment;
  if (fromEnvironment.value.kind !== 'continue') {
    return ok({ action: fromEnvironment.value.kind });
  }

  const fromCommandLine = interpretArguments(fromEnvironment.value.state, argv.slice(1));
  if (!fromCommandLine.success) return fromCommandLine;
  if (fromCommandLine.value.kind !== 'continue') {
    return ok({ action: fromCommandLine.value.kind });
  }

  state = fromCommandLine.value.state;
  const { operands } = fromCommandLine.value;
  let config = normalizeConfiguration(state);
  // the resolver logs under the final verbosity
  setLogLevel(verbosityToLogLevel(config.verbosity));

  // no filenames and no file list: read standard input
  const files = operands.length === 0 && !state.filesList ? ['-'] : operands;

  let invocation: ResolvedInvocation;
  if (config.mode === 'compress' || config.format === 'raw') {
    const settings = resolveCompressionSettings(
      {
        mode: config.mode,
        format: config.format,
        filters: state.filters,
        preset: state.preset,
        memoryBudget: config.memoryBudget,
        threadsRequested: config.threadsRequested,
      },
      options.costModel ?? defaultCostModel
    );
    if (!settings.success) return settings;

    config = { ...config, threadsEffective: settings.value.threadsEffective };
    invocation = { config, compression: settings.value, files };
  } else {
    config = { ...config, threadsEffective: config.threadsRequested };
    invocation = { config, files };
  }

  if (state.filesList) {
    const filesList = openFilesList(state.filesList, openFile);
    if (!filesList.success) return filesList;
    invocation = { ...invocation, config: { ...invocation.config, filesList: filesList.value } };
  }

  return ok({ action: 'run', invocation });
}
