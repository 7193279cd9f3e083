/**
 * Memory Configuration Section
 *
 * Where the default memory usage limit comes from when -M is not given.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const memorySection = {
  name: 'memory',
  description: 'Default memory usage limit.',
  options: {
    limitBytes: {
      envKey: 'XZOPT_MEMORY_LIMIT',
      defaultValue: 0,
      description: 'Default memory usage limit in bytes; 0 derives it from physical memory.',
      schema: z.number().int().min(0).max(Number.MAX_SAFE_INTEGER),
      parse: 'int',
    },
    limitPercent: {
      envKey: 'XZOPT_MEMORY_LIMIT_PERCENT',
      defaultValue: 40,
      description: 'Share of physical memory used as the default limit, in percent.',
      schema: z.number().int().min(1).max(100),
      parse: 'int',
    },
  },
} satisfies ConfigSectionMeta;
