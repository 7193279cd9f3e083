/**
 * Centralized configuration module for xzopt
 *
 * Environment settings are described in src/config/registry/. Each option
 * declares envKey, default, description, and schema; getConfig() builds the
 * object from the registry and validates it on first use, so an invalid
 * value surfaces as an XzoptError inside the caller's error handling.
 *
 * Usage:
 *   import { getConfig } from './config/index.js';
 *   console.log(getConfig().memory.limitPercent);
 */

import { totalmem } from 'node:os';
import { z } from 'zod';
import {
  configRegistry,
  buildConfigFromRegistry,
  validateConfig,
  loggingSection,
  memorySection,
  runtimeSection,
} from './registry/index.js';

// =============================================================================
// CONFIGURATION SCHEMA
// =============================================================================

const loggingSchema = z.object({
  level: loggingSection.options.level.schema,
  pretty: loggingSection.options.pretty.schema,
});

const runtimeSchema = z.object({
  nodeEnv: runtimeSection.options.nodeEnv.schema,
});

const configSchema = z.object({
  logging: loggingSchema,
  memory: z.object({
    limitBytes: memorySection.options.limitBytes.schema,
    limitPercent: memorySection.options.limitPercent.schema,
  }),
  runtime: runtimeSchema,
});

const loggerConfigSchema = z.object({
  logging: loggingSchema,
  runtime: runtimeSchema,
});

export type Config = z.infer<typeof configSchema>;
export type LoggerConfig = z.infer<typeof loggerConfigSchema>;

// =============================================================================
// BUILD
// =============================================================================

/**
 * Build and validate the config from an environment (process.env by default).
 */
export function buildConfig(env: Record<string, string | undefined> = process.env): Config {
  return validateConfig(buildConfigFromRegistry(configRegistry, env), configSchema);
}

/**
 * The settings the logger starts with. Their parsers fall back to the
 * defaults for unusable values, so building them cannot fail.
 */
export function buildLoggerConfig(
  env: Record<string, string | undefined> = process.env
): LoggerConfig {
  const registry = { sections: { logging: loggingSection, runtime: runtimeSection } };
  return validateConfig(buildConfigFromRegistry(registry, env), loggerConfigSchema);
}

let cachedConfig: Config | undefined;

/**
 * The validated process configuration, built on first use.
 * Throws CONFIG_INVALID when an XZOPT_* variable is out of range.
 */
export function getConfig(): Config {
  cachedConfig ??= buildConfig();
  return cachedConfig;
}

/**
 * Drop the cached configuration so the next getConfig() reads the
 * environment again.
 */
export function reloadConfig(): void {
  cachedConfig = undefined;
}

/**
 * Memory usage limit used when the command line does not set one.
 */
export function getDefaultMemoryBudget(
  memory: Config['memory'] = getConfig().memory,
  physicalMemory: number = totalmem()
): number {
  if (memory.limitBytes > 0) return memory.limitBytes;
  return Math.max(1, Math.floor((physicalMemory * memory.limitPercent) / 100));
}

// Re-export registry for documentation
export { configRegistry } from './registry/index.js';
export { getAllEnvVars } from './registry/schema-builder.js';
