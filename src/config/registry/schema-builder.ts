/**
 * Registry-driven config building
 *
 * Reads every registered env var, converts it with the option's parser and
 * validates the assembled object against a Zod schema.
 */

import type { z } from 'zod';
import type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta, ParserType } from './types.js';
import { parseBoolean, parseInt_, parseString } from './parsers.js';
import { XzoptError, ErrorCodes } from '../../core/errors.js';

type Environment = Record<string, string | undefined>;

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Format Zod validation errors into human-readable messages
 */
export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((err) => {
    const path = err.path.map(String).join('.');
    return `${path}: ${err.message}`;
  });
}

/**
 * Validate a config object against a schema.
 * Returns the validated config or throws with every issue listed.
 */
export function validateConfig<T>(config: unknown, schema: z.ZodType<T>): T {
  const result = schema.safeParse(config);

  if (!result.success) {
    const errors = formatZodErrors(result.error);
    throw new XzoptError(
      `Configuration validation failed:\n${errors.map((e) => `  - ${e}`).join('\n')}`,
      ErrorCodes.CONFIG_INVALID,
      { errors }
    );
  }

  return result.data;
}

// =============================================================================
// DOCUMENTATION HELPERS
// =============================================================================

/**
 * Get a human-readable type string from a Zod schema.
 */
export function getZodTypeString(schema: z.ZodType): string {
  const name = schema.constructor.name;

  if (name === 'ZodString') return 'string';
  if (name === 'ZodNumber') return 'number';
  if (name === 'ZodBoolean') return 'boolean';
  if (name === 'ZodEnum') return 'enum';

  return 'unknown';
}

export interface EnvVarDoc {
  envKey: string;
  description: string;
  defaultValue: unknown;
  type: string;
  section: string;
}

/**
 * Get all environment variables from the registry
 */
export function getAllEnvVars(registry: ConfigRegistry): EnvVarDoc[] {
  const envVars: EnvVarDoc[] = [];

  for (const [sectionKey, section] of Object.entries(registry.sections)) {
    for (const option of Object.values(section.options)) {
      envVars.push({
        envKey: option.envKey,
        description: option.description,
        defaultValue: option.defaultValue,
        type: option.allowedValues?.join(' | ') ?? getZodTypeString(option.schema),
        section: sectionKey,
      });
    }
  }

  return envVars;
}

// =============================================================================
// CONFIG BUILDING FROM REGISTRY
// =============================================================================

/**
 * Infer parser type from Zod schema when not explicitly specified
 */
function inferParserFromSchema(schema: z.ZodType): ParserType {
  const name = schema.constructor.name;

  if (name === 'ZodBoolean') return 'boolean';
  if (name === 'ZodNumber') return 'int';

  return 'string';
}

/**
 * Parse an environment variable value using the option's parser.
 * Unparseable values fall back to the default; the schema has the last word.
 */
function parseEnvValue(option: ConfigOptionMeta, envValue: string | undefined): unknown {
  const { defaultValue } = option;

  if (envValue === undefined || envValue === '') {
    return defaultValue;
  }

  const parserType: ParserType = option.parse ?? inferParserFromSchema(option.schema);
  const numericDefault = typeof defaultValue === 'number' ? defaultValue : Number.NaN;

  switch (parserType) {
    case 'boolean':
      return parseBoolean(envValue, defaultValue === true);

    case 'int':
      return parseInt_(envValue, numericDefault);

    case 'string':
      if (option.allowedValues) {
        return parseString(envValue, String(defaultValue), option.allowedValues);
      }
      return envValue;
  }
}

/**
 * Build a config section from registry metadata
 */
function buildSectionFromRegistry(
  section: ConfigSectionMeta,
  env: Environment
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, option] of Object.entries(section.options)) {
    result[key] = parseEnvValue(option, option.envKey ? env[option.envKey] : undefined);
  }

  return result;
}

/**
 * Build the raw (unvalidated) config object from registry metadata.
 */
export function buildConfigFromRegistry(
  registry: ConfigRegistry,
  env: Environment = process.env
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, section] of Object.entries(registry.sections)) {
    result[key] = buildSectionFromRegistry(section, env);
  }

  return result;
}
