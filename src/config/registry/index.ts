/**
 * Config Registry
 *
 * Assembles all configuration sections into a complete registry.
 * This is the single source of truth for config metadata.
 */

import type { ConfigRegistry } from './types.js';
import { loggingSection } from './sections/logging.js';
import { memorySection } from './sections/memory.js';
import { runtimeSection } from './sections/runtime.js';

export const configRegistry: ConfigRegistry = {
  sections: {
    logging: loggingSection,
    memory: memorySection,
    runtime: runtimeSection,
  },
};

export { loggingSection, memorySection, runtimeSection };

// Re-export types and utilities
export type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta } from './types.js';
export { validateConfig, getAllEnvVars, buildConfigFromRegistry } from './schema-builder.js';
