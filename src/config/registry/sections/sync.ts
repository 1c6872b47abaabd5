/**
 * Sync Configuration Section
 *
 * Where the group document lives, where clones go, and how a run behaves.
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const syncSection = {
  name: 'sync',
  description: 'Repository synchronisation settings.',
  options: {
    configFile: {
      envKey: 'REPOS_CONFIG_FILE',
      defaultValue: 'REPO-GROUPS.md',
      description: 'Markdown document listing groups and their repositories. Supports ~ expansion.',
      schema: z.string().min(1),
    },
    reposDir: {
      envKey: 'REPOS_DIR',
      defaultValue: 'repos',
      description: 'Directory that holds one folder per group. Supports ~ expansion.',
      schema: z.string().min(1),
    },
    parallelJobs: {
      envKey: 'PARALLEL_JOBS',
      defaultValue: 5,
      description: 'Maximum number of repositories cloned or updated at the same time.',
      schema: z.number().int().min(1).max(64),
      parse: 'int',
    },
    cleanup: {
      envKey: 'REPOS_CLEANUP',
      defaultValue: true,
      description: 'Delete local clones whose remote repository no longer exists.',
      schema: z.boolean(),
    },
    extraDetailLimit: {
      envKey: 'REPOS_EXTRA_DETAIL_LIMIT',
      defaultValue: 20,
      description: 'Show details for extra local repositories only up to this many.',
      schema: z.number().int().min(0),
      parse: 'int',
    },
  },
} satisfies ConfigSectionMeta;
