/**
 * Planner Service
 *
 * Scans the selected groups and decides, per repository, whether it has to be
 * cloned, updated or skipped. Nothing is fetched or pulled here; the only
 * filesystem changes are creating group folders and moving clones from the
 * old flat layout (<baseDir>/<repo>) into their group folder.
 */

import { existsSync, mkdirSync, renameSync, statSync } from 'node:fs';
import { join } from 'node:path';
import type { RepoGroup, SyncPlan, SyncTask } from '../core/types.js';
import { groupFolder } from './group-config.service.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('planner');

export interface RepoResolver {
  resolve(name: string): Promise<string | undefined>;
}

export interface PlanOptions {
  /** Directory the old flat layout lived in */
  baseDir: string;
  /** Directory holding the group folders */
  reposDir: string;
  index: RepoResolver;
  /** Classify only: no folders are created and nothing is moved */
  dryRun?: boolean;
}

export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function isGitRepository(path: string): boolean {
  return isDirectory(path) && existsSync(join(path, '.git'));
}

/**
 * Move a clone from the flat layout into its group folder.
 * Returns false (and leaves everything in place) when the move fails.
 */
function moveLegacyClone(from: string, to: string, folder: string): boolean {
  try {
    mkdirSync(folder, { recursive: true });
    renameSync(from, to);
    return true;
  } catch (error) {
    logger.warn({ from, to, error: error instanceof Error ? error.message : String(error) }, 'Could not move clone into its group folder');
    return false;
  }
}

export async function planSync(groups: readonly RepoGroup[], options: PlanOptions): Promise<SyncPlan> {
  const plan: SyncPlan = {
    clone: [],
    update: [],
    skipped: [],
    notFound: [],
    moved: [],
    groupFolders: [],
    totalChecked: 0,
  };

  const total = groups.reduce((sum, group) => sum + group.repos.length, 0);
  logger.info({ groups: groups.length, repos: total }, 'Scanning repository state');

  for (const group of groups) {
    const folder = groupFolder(group, options.reposDir);
    plan.groupFolders.push(folder);

    if (!options.dryRun) {
      mkdirSync(folder, { recursive: true });
    }

    for (const name of group.repos) {
      plan.totalChecked++;
      const progress = `${plan.totalChecked}/${total}`;

      const fullName = await options.index.resolve(name);
      if (!fullName) {
        logger.warn({ repo: name, progress }, 'Remote repository not found');
        plan.notFound.push({ name, group: group.name });
        continue;
      }

      const path = join(folder, name);
      const task: SyncTask = { fullName, name, group: group.name, groupFolder: folder, path };
      const legacyPath = join(options.baseDir, name);

      if (isGitRepository(path)) {
        plan.update.push(task);
        logger.debug({ repo: fullName, progress }, 'Present, will update');
      } else if (isGitRepository(legacyPath)) {
        // A failed move still gets an update attempt at the new path
        if (options.dryRun) {
          plan.moved.push({ from: legacyPath, to: path });
        } else if (moveLegacyClone(legacyPath, path, folder)) {
          logger.info({ repo: fullName, from: legacyPath, to: path }, 'Moved clone into its group folder');
          plan.moved.push({ from: legacyPath, to: path });
        }
        plan.update.push(task);
      } else if (isDirectory(path)) {
        logger.warn({ repo: fullName, path, progress }, 'Directory exists but is not a git repository, skipping');
        plan.skipped.push({ name, group: group.name, path });
      } else {
        plan.clone.push(task);
        logger.debug({ repo: fullName, progress }, 'Missing, will clone');
      }
    }
  }

  logger.info(
    {
      clone: plan.clone.length,
      update: plan.update.length,
      skipped: plan.skipped.length,
      notFound: plan.notFound.length,
    },
    'Scan complete'
  );

  return plan;
}
