/**
 * Repo Sync Service
 *
 * Clones or updates one repository. Failures are returned as outcomes, never
 * thrown, so one bad repository does not stop the batch.
 */

import { mkdirSync } from 'node:fs';
import type { SyncOutcome, SyncTask } from '../core/types.js';
import type { GitHubClient } from './github.service.js';
import type { GitClient } from '../utils/git.js';
import { summarizeOutput, type CommandResult } from '../utils/exec.js';
import { isDirectory, isGitRepository } from './planner.service.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('repo-sync');

export const NOT_A_GIT_REPOSITORY = 'directory exists but is not a git repository';

/**
 * What the executor needs from a syncer; lets tests substitute a fake
 */
export interface RepoSyncer {
  clone(task: SyncTask): Promise<SyncOutcome>;
  update(task: SyncTask): Promise<SyncOutcome>;
  /** Clone, update or skip depending on what is at task.path right now */
  syncOne(task: SyncTask): Promise<SyncOutcome>;
}

export interface RepoSyncServiceDeps {
  github: GitHubClient;
  git: GitClient;
  /** Clock for durations; defaults to Date.now */
  now?: () => number;
}

export function shortHash(hash: string): string {
  return hash.slice(0, 8);
}

export class RepoSyncService implements RepoSyncer {
  private readonly github: GitHubClient;
  private readonly git: GitClient;
  private readonly now: () => number;

  constructor(deps: RepoSyncServiceDeps) {
    this.github = deps.github;
    this.git = deps.git;
    this.now = deps.now ?? Date.now;
  }

  async clone(task: SyncTask): Promise<SyncOutcome> {
    const start = this.now();
    mkdirSync(task.groupFolder, { recursive: true });

    logger.info({ repo: task.fullName, path: task.path }, 'Cloning');
    await this.logDetails(task.fullName);

    const result = await this.github.cloneRepository(task.fullName, task.path);
    const durationMs = this.now() - start;

    if (result.exitCode === 0) {
      logger.info({ repo: task.fullName, durationMs }, 'Cloned');
      return { status: 'cloned', durationMs };
    }

    const error = `clone failed (exit ${result.exitCode}): ${summarizeOutput(result)}`;
    logger.error({ repo: task.fullName, durationMs, error }, 'Clone failed');
    return { status: 'failed', durationMs, error };
  }

  async update(task: SyncTask): Promise<SyncOutcome> {
    const start = this.now();
    const cwd = task.path;

    if (!isGitRepository(cwd)) {
      return { status: 'failed', durationMs: 0, error: `not a git repository: ${cwd}` };
    }

    logger.info({ repo: task.fullName, path: cwd }, 'Updating');

    // Detached HEAD: get back onto the remote default branch before pulling
    if (!(await this.git.currentBranchRef(cwd))) {
      const defaultBranch = await this.git.defaultRemoteBranch(cwd);
      if (!(await this.git.checkout(cwd, defaultBranch))) {
        logger.warn({ repo: task.fullName, branch: defaultBranch }, 'Could not leave detached HEAD');
      }
    }

    const branch = await this.git.abbrevBranch(cwd);
    const stashed = (await this.git.uncommittedChanges(cwd)) > 0 && (await this.git.stash(cwd));
    await this.git.abortInProgressOperations(cwd);

    const beforeHash = await this.git.headHash(cwd);
    await this.logDetails(task.fullName);

    const result = await this.pullLatest(task, branch);

    // Only pop what this run stashed; older stash entries belong to the user
    if (stashed) {
      await this.git.stashPop(cwd);
    }

    const durationMs = this.now() - start;
    if (result.exitCode !== 0) {
      const error = `pull failed (exit ${result.exitCode}): ${summarizeOutput(result)}`;
      logger.error(
        { repo: task.fullName, durationMs, error },
        'Update failed; check network access, permissions or conflicts that need manual resolution'
      );
      return { status: 'failed', durationMs, error, beforeHash };
    }

    const afterHash = await this.git.headHash(cwd);
    if (beforeHash && afterHash && beforeHash !== afterHash) {
      logger.info({ repo: task.fullName, durationMs }, `Updated ${shortHash(beforeHash)} -> ${shortHash(afterHash)}`);
    } else {
      logger.info({ repo: task.fullName, durationMs }, 'Already up to date');
    }
    return { status: 'updated', durationMs, beforeHash, afterHash };
  }

  syncOne(task: SyncTask): Promise<SyncOutcome> {
    if (isGitRepository(task.path)) {
      return this.update(task);
    }
    if (isDirectory(task.path)) {
      return Promise.resolve({ status: 'skipped', durationMs: 0, error: NOT_A_GIT_REPOSITORY });
    }
    return this.clone(task);
  }

  /**
   * Forks (an "upstream" remote is configured) sync through gh first.
   * Otherwise, or when that fails: rebase pull, merge pull, then a plain pull.
   */
  private async pullLatest(task: SyncTask, branch: string): Promise<CommandResult> {
    const cwd = task.path;

    if (await this.git.remoteUrl(cwd, 'upstream')) {
      logger.info({ repo: task.fullName, branch }, 'Fork detected, syncing with upstream');
      const synced = await this.github.syncFork(cwd, branch);
      if (synced.exitCode === 0) {
        return synced;
      }
      logger.warn({ repo: task.fullName, reason: summarizeOutput(synced) }, 'Upstream sync failed, falling back to git pull');
    }

    const rebased = await this.git.pull(cwd, { rebase: true, remote: 'origin', branch });
    if (rebased.exitCode === 0) return rebased;

    if (this.git.rebaseInProgress(cwd)) {
      await this.git.run(cwd, ['rebase', '--abort']);
    }
    const merged = await this.git.pull(cwd, { remote: 'origin', branch });
    if (merged.exitCode === 0) return merged;

    if (this.git.mergeInProgress(cwd)) {
      await this.git.run(cwd, ['merge', '--abort']);
    }
    return this.git.pull(cwd);
  }

  private async logDetails(fullName: string): Promise<void> {
    const info = await this.github.viewRepository(fullName);
    if (!info) return;
    logger.debug(
      {
        repo: fullName,
        description: info.description ?? undefined,
        language: info.language ?? undefined,
        stars: info.stargazerCount || undefined,
      },
      'Repository details'
    );
  }
}
