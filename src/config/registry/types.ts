/**
 * Config Registry Type Definitions
 *
 * Metadata-driven configuration with Zod validation.
 * Each config option declares envKey, default, description, schema, and parser.
 */

import type { z } from 'zod';

// =============================================================================
// PARSER TYPES
// =============================================================================

/**
 * Built-in parser types for env var conversions
 */
export type ParserType =
  | 'string' // Direct string value
  | 'boolean' // '1', 'true' -> true
  | 'number' // parseFloat
  | 'int'; // parseInt

// =============================================================================
// CONFIG OPTION TYPES
// =============================================================================

/**
 * Metadata for a single configuration option
 */
export interface ConfigOptionMeta<T = unknown> {
  /** Environment variable key (e.g., 'PARALLEL_JOBS') */
  envKey: string;

  /** Default value when env var is not set */
  defaultValue: T;

  description: string;

  /** Zod schema for validation */
  schema: z.ZodType<T>;

  /** Parser type; inferred from the default value when omitted */
  parse?: ParserType;

  /** Allowed values for string enums (used with 'string' parser) */
  allowedValues?: readonly string[];
}

// =============================================================================
// CONFIG SECTION TYPES
// =============================================================================

/**
 * Metadata for a configuration section (group of related options)
 */
export interface ConfigSectionMeta {
  /** Section name (e.g., 'sync', 'github') */
  name: string;

  description: string;

  /** Options in this section, keyed by config property name */
  options: Record<string, ConfigOptionMeta>;
}

/**
 * Complete registry of all configuration sections
 */
export interface ConfigRegistry {
  sections: Record<string, ConfigSectionMeta>;
}
