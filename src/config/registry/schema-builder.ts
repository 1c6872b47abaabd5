/**
 * Zod Schema Builder
 *
 * Reads option values from the environment using registry metadata and
 * validates the assembled config with clear error messages.
 */

import type { z } from 'zod';
import type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta, ParserType } from './types.js';
import { parseBoolean, parseNumber, parseInt_, parseString } from './parsers.js';
import { createInvalidConfigError } from '../../core/errors.js';

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
 * Returns the validated config or throws with every failing path listed.
 */
export function validateConfig<T>(config: unknown, schema: z.ZodType<T>): T {
  const result = schema.safeParse(config);

  if (!result.success) {
    throw createInvalidConfigError(formatZodErrors(result.error));
  }

  return result.data;
}

// =============================================================================
// CONFIG BUILDING FROM REGISTRY
// =============================================================================

/**
 * Infer parser type from the default value when not explicitly specified
 */
function inferParser(option: ConfigOptionMeta): ParserType {
  switch (typeof option.defaultValue) {
    case 'boolean':
      return 'boolean';
    case 'number':
      return 'number';
    default:
      return 'string';
  }
}

/**
 * Parse an environment variable value using the option's parser.
 * The result is checked against the option schema by validateConfig.
 */
export function parseEnvValue(option: ConfigOptionMeta, envValue: string | undefined): unknown {
  const defaultValue = option.defaultValue;

  if (envValue === undefined || envValue === '') {
    return defaultValue;
  }

  const parserType = option.parse ?? inferParser(option);

  switch (parserType) {
    case 'boolean':
      return parseBoolean(envValue, typeof defaultValue === 'boolean' ? defaultValue : false);

    case 'number':
      return parseNumber(envValue, typeof defaultValue === 'number' ? defaultValue : 0);

    case 'int':
      return parseInt_(envValue, typeof defaultValue === 'number' ? defaultValue : 0);

    case 'string':
      return parseString(
        envValue,
        typeof defaultValue === 'string' ? defaultValue : '',
        option.allowedValues
      );
  }
}

function buildSectionFromRegistry(
  section: ConfigSectionMeta,
  env: NodeJS.ProcessEnv
): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, option] of Object.entries(section.options)) {
    result[key] = parseEnvValue(option, env[option.envKey]);
  }

  return result;
}

/**
 * Build raw config values from registry metadata.
 * This is the single source of truth - no manual env var reading needed.
 */
export function buildConfigFromRegistry(
  registry: ConfigRegistry,
  env: NodeJS.ProcessEnv = process.env
): Record<string, Record<string, unknown>> {
  const result: Record<string, Record<string, unknown>> = {};

  for (const [key, section] of Object.entries(registry.sections)) {
    result[key] = buildSectionFromRegistry(section, env);
  }

  return result;
}
