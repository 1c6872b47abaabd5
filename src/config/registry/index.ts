/**
 * Config Registry
 *
 * Assembles all configuration sections into a complete registry.
 */

import type { ConfigRegistry } from './types.js';
import { loggingSection } from './sections/logging.js';
import { syncSection } from './sections/sync.js';
import { githubSection } from './sections/github.js';
import { retrySection } from './sections/retry.js';

export const configRegistry: ConfigRegistry = {
  sections: {
    logging: loggingSection,
    sync: syncSection,
    github: githubSection,
    retry: retrySection,
  },
};

export { loggingSection, syncSection, githubSection, retrySection };
export { buildConfigFromRegistry, validateConfig, formatZodErrors, parseEnvValue } from './schema-builder.js';
export type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta, ParserType } from './types.js';
