/**
 * Report Service
 *
 * Compares what the group document expects with the clones on disk.
 */

import type { DiffReport, RepoDetail, RepoGroup } from '../core/types.js';
import type { GitHubClient } from './github.service.js';
import type { RemoteIndex } from './remote-index.service.js';
import { listClones } from './cleanup.service.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('report');

const DESCRIPTION_LIMIT = 60;
const DESCRIPTION_KEEP = 57;

export function truncateDescription(description: string): string {
  return description.length > DESCRIPTION_LIMIT
    ? `${description.slice(0, DESCRIPTION_KEEP)}...`
    : description;
}

/**
 * Full names of every clone in the group folders that the index recognises
 */
export function scanLocalRepos(groupFolders: readonly string[], index: RemoteIndex): Set<string> {
  const local = new Set<string>();
  for (const folder of groupFolders) {
    for (const path of listClones(folder)) {
      const fullName = index.lookup(path.slice(folder.length + 1));
      if (fullName) local.add(fullName);
    }
  }
  return local;
}

export interface DiffReportOptions {
  index: RemoteIndex;
  /** Full names found on disk (see scanLocalRepos) */
  local: ReadonlySet<string>;
  failedCount: number;
  client: GitHubClient;
  /** Above this many extra repositories, they are listed by name only */
  extraDetailLimit: number;
}

async function describe(client: GitHubClient, fullName: string): Promise<RepoDetail> {
  const info = await client.viewRepository(fullName);
  const detail: RepoDetail = { fullName };
  if (!info) return detail;

  if (info.language) detail.language = info.language;
  if (info.stargazerCount > 0) detail.stars = info.stargazerCount;
  if (info.description) detail.description = truncateDescription(info.description);
  return detail;
}

export async function buildDiffReport(
  groups: readonly RepoGroup[],
  options: DiffReportOptions
): Promise<DiffReport> {
  const { index, local, client } = options;

  const expected = new Set<string>();
  for (const group of groups) {
    for (const name of group.repos) {
      const fullName = await index.resolve(name);
      if (fullName) expected.add(fullName);
    }
  }

  const missingNames = [...expected].filter((fullName) => !local.has(fullName));
  const extraNames = [...local].filter((fullName) => !expected.has(fullName));
  const totalSynced = expected.size - missingNames.length;

  const missing: RepoDetail[] = [];
  for (const fullName of missingNames) {
    missing.push(await describe(client, fullName));
  }

  const extraDetailed = extraNames.length <= options.extraDetailLimit;
  const extra: RepoDetail[] = [];
  for (const fullName of extraNames) {
    extra.push(extraDetailed ? await describe(client, fullName) : { fullName });
  }

  const report: DiffReport = {
    totalExpected: expected.size,
    totalLocal: local.size,
    totalSynced,
    missing,
    extra,
    extraDetailed,
    failedCount: options.failedCount,
    complete: missing.length === 0 && options.failedCount === 0,
  };
  if (expected.size > 0) {
    report.syncRate = Math.floor((totalSynced * 100) / expected.size);
  }

  logger.debug(
    { expected: expected.size, local: local.size, missing: missing.length, extra: extra.length },
    'Diff report built'
  );
  return report;
}

