/**
 * Config Registry Type Definitions
 *
 * Metadata-driven environment configuration with Zod validation.
 * Each option declares envKey, default, description, schema, and parser.
 */

import type { z } from 'zod';

/**
 * Built-in parser types for env var conversions
 */
export type ParserType =
  | 'string' // Direct string value
  | 'boolean' // '1', 'true' -> true
  | 'int'; // parseInt

/**
 * Metadata for a single configuration option
 */
export interface ConfigOptionMeta<T = unknown> {
  /** Environment variable key (e.g., 'XZOPT_MEMORY_LIMIT') */
  envKey: string;

  /** Default value when env var is not set */
  defaultValue: T;

  /** Description for documentation */
  description: string;

  /** Zod schema for validation */
  schema: z.ZodType<T>;

  /** Parser type; inferred from the schema when omitted */
  parse?: ParserType;

  /** Allowed values for string enums (used with 'string' parser) */
  allowedValues?: readonly string[];
}

/**
 * Metadata for a configuration section (group of related options)
 */
export interface ConfigSectionMeta {
  /** Section name (e.g., 'logging', 'memory') */
  name: string;

  /** Section description for documentation */
  description: string;

  /** Options in this section, keyed by config property name */
  options: Record<string, ConfigOptionMeta>;
}

/**
 * Complete registry of all configuration options
 */
export interface ConfigRegistry {
  sections: Record<string, ConfigSectionMeta>;
}
