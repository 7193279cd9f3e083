// Main entry point for xzopt (library usage)
// The command-line program lives in ./cli.ts.

// Core types and errors
export * from './core/types.js';
export * from './core/errors.js';
export { ok, fail, type Result } from './core/result.js';

// Filters
export * from './filters/types.js';
export { EMPTY_CHAIN, addFilter, terminateChain, isLegacyCompatible } from './filters/chain.js';
export {
  MAX_FILTERS,
  FILTER_REGISTRY,
  getFilterMeta,
  createFilterEntry,
} from './filters/registry.js';
export {
  PRESET_MIN,
  PRESET_MAX,
  PRESET_DEFAULT,
  isPresetLevel,
  lzmaPreset,
} from './filters/presets.js';
export { parseLzmaOptions, parseDeltaOptions, parseSubblockOptions } from './filters/options.js';
export {
  defaultCostModel,
  lzEncoderUsage,
  type CoderDirection,
  type MemoryCostModel,
} from './filters/memusage.js';

// Argument pipeline
export {
  parseArguments,
  createDefaultState,
  normalizeConfiguration,
  type OpenFile,
  type ParseOptions,
  type ParseOutcome,
} from './args/index.js';
export {
  applyFlag,
  interpretFlags,
  interpretArguments,
  type FlagOutcome,
  type Interpretation,
} from './args/interpreter.js';
export {
  ENVIRONMENT_VARIABLE,
  tokenizeArgumentString,
  buildEnvironmentArgv,
  applyEnvironmentArguments,
} from './args/environment.js';
export { applyInvocationName } from './args/invocation.js';
export {
  resolveCompressionSettings,
  capThreads,
  presetFilter,
  type CompressionInput,
} from './services/compression-settings.service.js';

// Configuration
export { getConfig, reloadConfig, getDefaultMemoryBudget, type Config } from './config/index.js';

// Utilities
export { parseUnsignedInteger } from './utils/parse-integer.js';
export { readFileList, splitFileList } from './utils/file-list.js';
export { runCli, type CliIO, type CliOptions } from './cli/index.js';
export { VERSION } from './version.js';
