/**
 * Workflow Service
 *
 * The two end-to-end runs behind the CLI:
 *   syncGroups  - plan, clone/update, retry, clean up, report
 *   checkGroups - read-only comparison of the document with the disk
 */

import type { DiffReport, RepoGroup, SyncPlan, SyncResult } from '../core/types.js';
import type { GitHubClient } from './github.service.js';
import type { GitClient } from '../utils/git.js';
import type { RepoSyncer } from './repo-sync.service.js';
import { RepoSyncService } from './repo-sync.service.js';
import { expectedRepoPaths, groupFolder, loadGroupConfig, selectGroups } from './group-config.service.js';
import { RemoteIndex } from './remote-index.service.js';
import { planSync } from './planner.service.js';
import { executeSync } from './sync-executor.service.js';
import { cleanupDeletedRepos, type CleanupResult } from './cleanup.service.js';
import { buildDiffReport, scanLocalRepos } from './report.service.js';
import type { RetryOptions } from '../utils/retry.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('workflow');

export interface WorkflowDeps {
  github: GitHubClient;
  git: GitClient;
  /** Defaults to a RepoSyncService over github and git */
  syncer?: RepoSyncer;
}

export interface CheckOptions {
  configPath: string;
  reposDir: string;
  /** Group names or fragments; empty means every group */
  groups: readonly string[];
  listLimit: number;
  extraDetailLimit: number;
  retry?: RetryOptions;
}

export interface SyncOptions extends CheckOptions {
  /** Directory the old flat layout lived in */
  baseDir: string;
  jobs: number;
  cleanup: boolean;
  dryRun: boolean;
  tuneGit: boolean;
}

export interface SyncRunResult {
  groups: string[];
  dryRun: boolean;
  plan: SyncPlan;
  /** Absent on a dry run */
  result?: SyncResult;
  /** On a dry run, `deleted` lists the clones cleanup would remove */
  cleanup?: CleanupResult;
  report: DiffReport;
}

export interface CheckRunResult {
  groups: string[];
  report: DiffReport;
}

function logSelection(selected: readonly RepoGroup[]): void {
  logger.info({ groups: selected.map((group) => group.name) }, 'Selected groups');
}

export async function syncGroups(deps: WorkflowDeps, options: SyncOptions): Promise<SyncRunResult> {
  const groupConfig = loadGroupConfig(options.configPath);
  const selected = selectGroups(groupConfig, options.groups);
  logSelection(selected);

  if (options.tuneGit && !options.dryRun) {
    await deps.git.tuneGlobalSettings();
  }

  const index = await RemoteIndex.load(deps.github, options.listLimit, options.retry);
  const plan = await planSync(selected, {
    baseDir: options.baseDir,
    reposDir: options.reposDir,
    index,
    dryRun: options.dryRun,
  });

  const groups = selected.map((group) => group.name);
  const reportOptions = {
    index,
    client: deps.github,
    extraDetailLimit: options.extraDetailLimit,
  };

  const runCleanup = (dryRun: boolean): Promise<CleanupResult> =>
    cleanupDeletedRepos({
      groupFolders: plan.groupFolders,
      expectedPaths: expectedRepoPaths(groupConfig, options.reposDir),
      index,
      client: deps.github,
      dryRun,
    });

  if (options.dryRun) {
    // Clones cleanup would remove; nothing is deleted
    const cleanup = options.cleanup ? await runCleanup(true) : undefined;
    const report = await buildDiffReport(selected, {
      ...reportOptions,
      local: scanLocalRepos(plan.groupFolders, index),
      failedCount: 0,
    });
    return { groups, dryRun: true, plan, cleanup, report };
  }

  const syncer = deps.syncer ?? new RepoSyncService({ github: deps.github, git: deps.git });
  const result = await executeSync(plan, { syncer, jobs: options.jobs });

  let cleanup: CleanupResult | undefined;
  if (options.cleanup) {
    cleanup = await runCleanup(false);
    result.stats.deleted = cleanup.deleted.length;
  }

  const report = await buildDiffReport(selected, {
    ...reportOptions,
    local: scanLocalRepos(plan.groupFolders, index),
    failedCount: result.stats.failed,
  });

  return { groups, dryRun: false, plan, result, cleanup, report };
}

export async function checkGroups(github: GitHubClient, options: CheckOptions): Promise<CheckRunResult> {
  const selected = selectGroups(loadGroupConfig(options.configPath), options.groups);
  logSelection(selected);
  const index = await RemoteIndex.load(github, options.listLimit, options.retry);
  const folders = selected.map((group) => groupFolder(group, options.reposDir));

  const report = await buildDiffReport(selected, {
    index,
    local: scanLocalRepos(folders, index),
    failedCount: 0,
    client: github,
    extraDetailLimit: options.extraDetailLimit,
  });
  return { groups: selected.map((group) => group.name), report };
}
