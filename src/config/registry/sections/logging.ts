/**
 * Logging Configuration Section
 *
 * Initial log level and output style. The verbosity flags of the command
 * line take over once arguments are parsed.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const loggingSection = {
  name: 'logging',
  description: 'Logging configuration.',
  options: {
    level: {
      envKey: 'XZOPT_LOG_LEVEL',
      defaultValue: 'warn',
      description: 'Log level before flags are read: silent, error, warn, info, or debug.',
      schema: z.enum(['silent', 'error', 'warn', 'info', 'debug']),
      allowedValues: ['silent', 'error', 'warn', 'info', 'debug'],
    },
    pretty: {
      envKey: 'XZOPT_LOG_PRETTY',
      defaultValue: false,
      description: 'Print human-readable log lines instead of JSON.',
      schema: z.boolean(),
    },
  },
} satisfies ConfigSectionMeta;
