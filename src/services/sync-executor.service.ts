/**
 * Sync Executor
 *
 * Runs a SyncPlan: clones first, then updates, each phase with a bounded
 * number of repositories in flight. Failures are retried once, one at a time,
 * after both phases; whatever still fails ends up in the failure list.
 */

import type {
  FailureKind,
  FailureRecord,
  SyncOutcome,
  SyncPlan,
  SyncResult,
  SyncStats,
  SyncTask,
} from '../core/types.js';
import { mapWithConcurrency } from '../utils/backpressure.js';
import { createComponentLogger } from '../utils/logger.js';
import type { RepoSyncer } from './repo-sync.service.js';
import { NOT_A_GIT_REPOSITORY } from './repo-sync.service.js';

const logger = createComponentLogger('executor');

export const NOT_FOUND_MESSAGE = 'remote repository not found';

export interface ExecuteOptions {
  syncer: RepoSyncer;
  /** Maximum repositories cloned or updated at once */
  jobs: number;
}

interface PendingFailure {
  task: SyncTask;
  kind: FailureKind;
  message: string;
}

/**
 * Run a syncer call and turn a rejection (e.g. gh missing mid-run) into a
 * failed outcome so the rest of the phase carries on
 */
async function settle(run: () => Promise<SyncOutcome>): Promise<SyncOutcome> {
  try {
    return await run();
  } catch (error) {
    return { status: 'failed', durationMs: 0, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Failure label for a repository whose owner is not known
 */
export function unknownOwner(name: string): string {
  return `unknown/${name}`;
}

export function emptyStats(): SyncStats {
  return { added: 0, updated: 0, deleted: 0, failed: 0 };
}

export async function executeSync(plan: SyncPlan, options: ExecuteOptions): Promise<SyncResult> {
  const { syncer, jobs } = options;
  const stats = emptyStats();
  const pending: PendingFailure[] = [];

  const record = (task: SyncTask, kind: FailureKind, outcome: SyncOutcome): void => {
    if (outcome.status === 'cloned') {
      stats.added++;
    } else if (outcome.status === 'updated') {
      stats.updated++;
    } else {
      pending.push({ task, kind, message: outcome.error ?? outcome.status });
    }
  };

  if (plan.clone.length > 0) {
    logger.info({ count: plan.clone.length, jobs }, 'Cloning missing repositories');
    const outcomes = await mapWithConcurrency(plan.clone, jobs, (task) => settle(() => syncer.clone(task)));
    outcomes.forEach((outcome, i) => {
      const task = plan.clone[i];
      if (task) record(task, 'clone', outcome);
    });
  }

  if (plan.update.length > 0) {
    logger.info({ count: plan.update.length, jobs }, 'Updating existing repositories');
    const outcomes = await mapWithConcurrency(plan.update, jobs, (task) => settle(() => syncer.update(task)));
    outcomes.forEach((outcome, i) => {
      const task = plan.update[i];
      if (task) record(task, 'update', outcome);
    });
  }

  // One more sequential attempt per failure; syncOne re-inspects the path, so a
  // half-finished clone that left a git directory behind gets updated instead
  let recovered = 0;
  const failures: FailureRecord[] = [];
  if (pending.length > 0) {
    logger.info({ count: pending.length }, 'Retrying failed repositories');
  }
  for (const failure of pending) {
    const outcome = await settle(() => syncer.syncOne(failure.task));
    if (outcome.status === 'cloned') {
      stats.added++;
      recovered++;
      logger.info({ repo: failure.task.fullName }, 'Retry succeeded');
    } else if (outcome.status === 'updated') {
      stats.updated++;
      recovered++;
      logger.info({ repo: failure.task.fullName }, 'Retry succeeded');
    } else {
      stats.failed++;
      failures.push({
        repo: failure.task.fullName,
        kind: failure.kind,
        message: outcome.error ?? failure.message,
      });
    }
  }

  // Planned skips are reported, not retried and not counted as failures
  for (const skipped of plan.skipped) {
    failures.push({ repo: unknownOwner(skipped.name), kind: 'skipped', message: NOT_A_GIT_REPOSITORY });
  }
  for (const missing of plan.notFound) {
    stats.failed++;
    failures.push({ repo: unknownOwner(missing.name), kind: 'not-found', message: NOT_FOUND_MESSAGE });
  }

  logger.info(
    { added: stats.added, updated: stats.updated, failed: stats.failed, recovered },
    'Sync finished'
  );

  return { stats, failures, retried: pending.length, recovered };
}
