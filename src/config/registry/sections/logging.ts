/**
 * Logging Configuration Section
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

export const loggingSection = {
  name: 'logging',
  description: 'Logging configuration.',
  options: {
    level: {
      envKey: 'LOG_LEVEL',
      defaultValue: 'info',
      description: 'Log level: fatal, error, warn, info, debug, or trace.',
      schema: z.enum(LOG_LEVELS),
      allowedValues: LOG_LEVELS,
    },
    debug: {
      envKey: 'REPOS_DEBUG',
      defaultValue: false,
      description: 'Enable debug logging regardless of LOG_LEVEL.',
      schema: z.boolean(),
    },
  },
} satisfies ConfigSectionMeta;
