/**
 * Git operations on a working copy
 *
 * Every call runs git with an explicit cwd through a CommandRunner, so several
 * repositories can be updated concurrently from one process.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import type { CommandResult, CommandRunner } from './exec.js';
import { summarizeOutput } from './exec.js';
import { createComponentLogger } from './logger.js';

const logger = createComponentLogger('git');

export const FALLBACK_BRANCH = 'main';

/** Global settings applied by tuneGlobalSettings(), as [key, value] */
export const GIT_TRANSFER_SETTINGS: ReadonlyArray<readonly [string, string]> = [
  ['http.postBuffer', '524288000'],
  ['http.lowSpeedLimit', '0'],
  ['http.lowSpeedTime', '0'],
  ['core.preloadindex', 'true'],
  ['core.fscache', 'true'],
];

export interface PullOptions {
  rebase?: boolean;
  remote?: string;
  branch?: string;
}

/**
 * Extract the remote default branch from `git remote show origin` output
 */
export function parseHeadBranch(remoteShowOutput: string): string | undefined {
  const match = /HEAD branch:\s*(\S+)/.exec(remoteShowOutput);
  const branch = match?.[1];
  return branch && branch !== '(unknown)' ? branch : undefined;
}

export class GitClient {
  constructor(
    private readonly runner: CommandRunner,
    private readonly gitBin: string = 'git'
  ) {}

  run(cwd: string, args: readonly string[]): Promise<CommandResult> {
    return this.runner.run(this.gitBin, args, { cwd });
  }

  /** refs/heads/<branch>, or undefined on a detached HEAD */
  async currentBranchRef(cwd: string): Promise<string | undefined> {
    const result = await this.run(cwd, ['symbolic-ref', '-q', 'HEAD']);
    const ref = result.stdout.trim();
    return result.exitCode === 0 && ref ? ref : undefined;
  }

  async defaultRemoteBranch(cwd: string): Promise<string> {
    const result = await this.run(cwd, ['remote', 'show', 'origin']);
    if (result.exitCode !== 0) return FALLBACK_BRANCH;
    return parseHeadBranch(result.stdout) ?? FALLBACK_BRANCH;
  }

  /**
   * Check out `branch`, creating it first if it does not exist locally
   */
  async checkout(cwd: string, branch: string): Promise<boolean> {
    const created = await this.run(cwd, ['checkout', '-b', branch]);
    if (created.exitCode === 0) return true;
    const switched = await this.run(cwd, ['checkout', branch]);
    return switched.exitCode === 0;
  }

  async abbrevBranch(cwd: string): Promise<string> {
    const result = await this.run(cwd, ['rev-parse', '--abbrev-ref', 'HEAD']);
    const branch = result.stdout.trim();
    return result.exitCode === 0 && branch && branch !== 'HEAD' ? branch : FALLBACK_BRANCH;
  }

  /** Number of entries in `git status --porcelain` */
  async uncommittedChanges(cwd: string): Promise<number> {
    const result = await this.run(cwd, ['status', '--porcelain']);
    if (result.exitCode !== 0) return 0;
    return result.stdout.split('\n').filter((line) => line.trim().length > 0).length;
  }

  /** Commit id of the newest stash entry, undefined when the stash is empty */
  async stashRef(cwd: string): Promise<string | undefined> {
    const result = await this.run(cwd, ['rev-parse', '-q', '--verify', 'refs/stash']);
    const ref = result.stdout.trim();
    return result.exitCode === 0 && ref ? ref : undefined;
  }

  /**
   * Stash local changes. True only when this call created a stash entry:
   * `git stash` also exits 0 with "No local changes to save" when only
   * untracked files are present.
   */
  async stash(cwd: string): Promise<boolean> {
    const before = await this.stashRef(cwd);
    const result = await this.run(cwd, ['stash']);
    if (result.exitCode !== 0) {
      logger.warn({ cwd, reason: summarizeOutput(result) }, 'Could not stash local changes');
      return false;
    }
    const after = await this.stashRef(cwd);
    return after !== undefined && after !== before;
  }

  async stashPop(cwd: string): Promise<boolean> {
    const result = await this.run(cwd, ['stash', 'pop']);
    if (result.exitCode !== 0) {
      logger.warn({ cwd, reason: summarizeOutput(result) }, 'Could not restore stashed changes; they remain in the stash');
    }
    return result.exitCode === 0;
  }

  /**
   * Abort a merge, cherry-pick or rebase left in progress
   */
  async abortInProgressOperations(cwd: string): Promise<string[]> {
    const gitDir = join(cwd, '.git');
    const aborted: string[] = [];

    if (existsSync(join(gitDir, 'MERGE_HEAD'))) {
      await this.run(cwd, ['merge', '--abort']);
      aborted.push('merge');
    }
    if (existsSync(join(gitDir, 'CHERRY_PICK_HEAD'))) {
      await this.run(cwd, ['cherry-pick', '--abort']);
      aborted.push('cherry-pick');
    }
    if (this.rebaseInProgress(cwd)) {
      await this.run(cwd, ['rebase', '--abort']);
      aborted.push('rebase');
    }

    if (aborted.length > 0) {
      logger.info({ cwd, aborted }, 'Aborted unfinished git operations');
    }
    return aborted;
  }

  rebaseInProgress(cwd: string): boolean {
    const gitDir = join(cwd, '.git');
    return (
      existsSync(join(gitDir, 'REBASE_HEAD')) ||
      existsSync(join(gitDir, 'rebase-merge')) ||
      existsSync(join(gitDir, 'rebase-apply'))
    );
  }

  mergeInProgress(cwd: string): boolean {
    return existsSync(join(cwd, '.git', 'MERGE_HEAD'));
  }

  async headHash(cwd: string): Promise<string | undefined> {
    const result = await this.run(cwd, ['rev-parse', 'HEAD']);
    const hash = result.stdout.trim();
    return result.exitCode === 0 && hash ? hash : undefined;
  }

  async remoteUrl(cwd: string, remote: string): Promise<string | undefined> {
    const result = await this.run(cwd, ['remote', 'get-url', remote]);
    const url = result.stdout.trim();
    return result.exitCode === 0 && url ? url : undefined;
  }

  pull(cwd: string, options: PullOptions = {}): Promise<CommandResult> {
    const args = ['pull', '--no-edit'];
    if (options.rebase) args.push('--rebase');
    if (options.remote) {
      args.push(options.remote);
      if (options.branch) args.push(options.branch);
    }
    return this.run(cwd, args);
  }

  /**
   * Apply GIT_TRANSFER_SETTINGS globally. Failures are logged, not thrown.
   */
  async tuneGlobalSettings(): Promise<number> {
    let applied = 0;
    for (const [key, value] of GIT_TRANSFER_SETTINGS) {
      const result = await this.runner.run(this.gitBin, ['config', '--global', key, value]);
      if (result.exitCode === 0) {
        applied++;
      } else {
        logger.warn({ key, reason: summarizeOutput(result) }, 'Could not apply git setting');
      }
    }
    return applied;
  }
}
