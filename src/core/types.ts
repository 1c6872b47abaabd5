/**
 * Domain types shared by the services and the CLI
 */

// =============================================================================
// GROUP DOCUMENT
// =============================================================================

export interface RepoGroup {
  /** Heading text, e.g. "Backend Services" */
  name: string;
  /** Normalised tag from the heading comment, e.g. "1号高地" */
  highland?: string;
  /** Repository names (without owner), in document order */
  repos: string[];
}

export interface GroupConfig {
  groups: RepoGroup[];
}

// =============================================================================
// GITHUB
// =============================================================================

export interface RepoInfo {
  name: string;
  description: string | null;
  language: string | null;
  stargazerCount: number;
  forkCount: number;
  updatedAt: string | null;
  isArchived: boolean;
  isPrivate: boolean;
}

export type RepoExistence = 'exists' | 'missing' | 'unknown';

// =============================================================================
// SYNC PLAN AND RESULTS
// =============================================================================

export interface SyncTask {
  /** owner/repo */
  fullName: string;
  /** repo */
  name: string;
  group: string;
  groupFolder: string;
  /** groupFolder/name */
  path: string;
}

export interface SkippedRepo {
  name: string;
  group: string;
  path: string;
}

export interface SyncPlan {
  clone: SyncTask[];
  update: SyncTask[];
  /** Target path exists but is not a git repository */
  skipped: SkippedRepo[];
  /** Names with no matching remote repository */
  notFound: Array<{ name: string; group: string }>;
  /** Legacy clones moved from the base directory into their group folder */
  moved: Array<{ from: string; to: string }>;
  groupFolders: string[];
  totalChecked: number;
}

export type SyncStatus = 'cloned' | 'updated' | 'skipped' | 'failed';

export interface SyncOutcome {
  status: SyncStatus;
  durationMs: number;
  error?: string;
  beforeHash?: string;
  afterHash?: string;
}

export type FailureKind = 'clone' | 'update' | 'skipped' | 'not-found';

export interface FailureRecord {
  /** owner/repo when known, otherwise the bare repository name */
  repo: string;
  kind: FailureKind;
  message: string;
}

export interface SyncStats {
  added: number;
  updated: number;
  deleted: number;
  failed: number;
}

export interface SyncResult {
  stats: SyncStats;
  failures: FailureRecord[];
  retried: number;
  recovered: number;
}

// =============================================================================
// REPORTS
// =============================================================================

export interface RepoDetail {
  fullName: string;
  language?: string;
  stars?: number;
  description?: string;
}

export interface DiffReport {
  totalExpected: number;
  totalLocal: number;
  totalSynced: number;
  missing: RepoDetail[];
  extra: RepoDetail[];
  /** Extra repositories are listed by name only when there are too many */
  extraDetailed: boolean;
  failedCount: number;
  /** floor(synced * 100 / expected); undefined when nothing is expected */
  syncRate?: number;
  complete: boolean;
}
