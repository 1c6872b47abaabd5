/**
 * Centralized configuration module
 *
 * Configuration is built from the registry at src/config/registry/.
 * Each option declares envKey, default, description, schema, and parser.
 *
 * To add a new config option:
 *   1. Find or create the section in src/config/registry/sections/
 *   2. Add the option with envKey, defaultValue, description, schema
 *   3. Reference its schema in configSchema below
 *
 * Usage:
 *   import { config } from './config/index.js';
 *   console.log(config.sync.parallelJobs);
 */

import { z } from 'zod';
import {
  configRegistry,
  buildConfigFromRegistry,
  validateConfig,
  loggingSection,
  syncSection,
  githubSection,
  retrySection,
} from './registry/index.js';
import { expandTilde } from './registry/parsers.js';

// =============================================================================
// CONFIG SCHEMA
// =============================================================================

const { options: logging } = loggingSection;
const { options: sync } = syncSection;
const { options: github } = githubSection;
const { options: retry } = retrySection;

const configSchema = z.object({
  logging: z.object({
    level: logging.level.schema,
    debug: logging.debug.schema,
  }),
  sync: z.object({
    configFile: sync.configFile.schema.transform(expandTilde),
    reposDir: sync.reposDir.schema.transform(expandTilde),
    parallelJobs: sync.parallelJobs.schema,
    cleanup: sync.cleanup.schema,
    extraDetailLimit: sync.extraDetailLimit.schema,
  }),
  github: z.object({
    ghBin: github.ghBin.schema,
    gitBin: github.gitBin.schema,
    listLimit: github.listLimit.schema,
    tuneGit: github.tuneGit.schema,
  }),
  retry: z.object({
    maxAttempts: retry.maxAttempts.schema,
    initialDelayMs: retry.initialDelayMs.schema,
    maxDelayMs: retry.maxDelayMs.schema,
    backoffMultiplier: retry.backoffMultiplier.schema,
  }),
});

export type Config = z.infer<typeof configSchema>;
export type LogLevel = Config['logging']['level'];

// =============================================================================
// BUILD CONFIGURATION
// =============================================================================

/**
 * Build configuration from registry metadata and validate it.
 */
export function buildConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return validateConfig(buildConfigFromRegistry(configRegistry, env), configSchema);
}

// Create the singleton config instance
export const config: Config = buildConfig();

/**
 * Reload configuration from environment variables.
 * Used after loadEnv() has pulled in a .env file.
 */
export function reloadConfig(): void {
  Object.assign(config, buildConfig());
}
