/**
 * Cleanup Service
 *
 * Removes local clones whose remote repository has been deleted. A clone is
 * only removed when GitHub positively answers that the repository is gone;
 * any doubt keeps it.
 */

import { readdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import type { GitHubClient } from './github.service.js';
import type { RemoteIndex } from './remote-index.service.js';
import { isDirectory, isGitRepository } from './planner.service.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('cleanup');

export interface CleanupOptions {
  groupFolders: readonly string[];
  /** Paths the group document expects a clone at */
  expectedPaths: ReadonlySet<string>;
  index: RemoteIndex;
  client: GitHubClient;
  dryRun?: boolean;
}

export interface CleanupResult {
  deleted: string[];
  kept: string[];
}

/**
 * Git clones directly inside `folder`
 */
export function listClones(folder: string): string[] {
  if (!isDirectory(folder)) return [];
  return readdirSync(folder, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => join(folder, entry.name))
    .filter((path) => isGitRepository(path));
}

async function remoteIsGone(name: string, index: RemoteIndex, client: GitHubClient): Promise<boolean> {
  if (index.has(name)) return false;

  const owner = await client.currentUser();
  if (!owner) return false;

  return (await client.repositoryExists(`${owner}/${name}`)) === 'missing';
}

export async function cleanupDeletedRepos(options: CleanupOptions): Promise<CleanupResult> {
  const result: CleanupResult = { deleted: [], kept: [] };

  for (const folder of options.groupFolders) {
    for (const path of listClones(folder)) {
      if (options.expectedPaths.has(path)) continue;

      const name = path.slice(folder.length + 1);
      if (!(await remoteIsGone(name, options.index, options.client))) {
        logger.debug({ path }, 'Not listed in the group document, keeping');
        result.kept.push(path);
        continue;
      }

      if (options.dryRun) {
        logger.info({ path }, 'Remote repository deleted; would remove local clone');
        result.deleted.push(path);
        continue;
      }

      try {
        rmSync(path, { recursive: true, force: true });
        logger.info({ path }, 'Remote repository deleted; removed local clone');
        result.deleted.push(path);
      } catch (error) {
        logger.warn({ path, error: error instanceof Error ? error.message : String(error) }, 'Could not remove local clone');
        result.kept.push(path);
      }
    }
  }

  return result;
}
