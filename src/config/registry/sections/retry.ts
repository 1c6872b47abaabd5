/**
 * Retry Configuration Section
 *
 * Backoff for GitHub calls that fail transiently.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const retrySection = {
  name: 'retry',
  description: 'Retry configuration for GitHub calls.',
  options: {
    maxAttempts: {
      envKey: 'REPOS_RETRY_MAX_ATTEMPTS',
      defaultValue: 3,
      description: 'Maximum attempts, including the first.',
      schema: z.number().int().min(1),
      parse: 'int',
    },
    initialDelayMs: {
      envKey: 'REPOS_RETRY_INITIAL_DELAY_MS',
      defaultValue: 500,
      description: 'Delay before the first retry in milliseconds.',
      schema: z.number().int().min(0),
      parse: 'int',
    },
    maxDelayMs: {
      envKey: 'REPOS_RETRY_MAX_DELAY_MS',
      defaultValue: 5000,
      description: 'Upper bound for the delay between retries.',
      schema: z.number().int().min(0),
      parse: 'int',
    },
    backoffMultiplier: {
      envKey: 'REPOS_RETRY_BACKOFF_MULTIPLIER',
      defaultValue: 2,
      description: 'Factor applied to the delay after each retry.',
      schema: z.number().min(1),
      parse: 'number',
    },
  },
} satisfies ConfigSectionMeta;
