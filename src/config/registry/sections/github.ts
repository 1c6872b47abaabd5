/**
 * GitHub Configuration Section
 */

import { z } from 'zod';
import type { ConfigSectionMeta } from '../types.js';

export const githubSection = {
  name: 'github',
  description: 'GitHub CLI and git settings.',
  options: {
    ghBin: {
      envKey: 'REPOS_GH_BIN',
      defaultValue: 'gh',
      description: 'GitHub CLI executable.',
      schema: z.string().min(1),
    },
    gitBin: {
      envKey: 'REPOS_GIT_BIN',
      defaultValue: 'git',
      description: 'git executable.',
      schema: z.string().min(1),
    },
    listLimit: {
      envKey: 'REPOS_LIST_LIMIT',
      defaultValue: 1000,
      description: 'Maximum number of repositories fetched from the account listing.',
      schema: z.number().int().min(1),
      parse: 'int',
    },
    tuneGit: {
      envKey: 'REPOS_TUNE_GIT',
      defaultValue: false,
      description: 'Apply global git transfer settings (http.postBuffer, lowSpeed*, preloadindex, fscache) before syncing.',
      schema: z.boolean(),
    },
  },
} satisfies ConfigSectionMeta;
