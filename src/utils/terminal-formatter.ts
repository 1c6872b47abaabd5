/**
 * Terminal Formatter - plain-text reports for the terminal
 *
 * Summary boxes, failure lists and the expected-vs-local diff report.
 * Everything returned here goes to stdout; logs go to stderr.
 */

import type { DiffReport, FailureRecord, RepoDetail, SyncPlan, SyncStats } from '../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Icons and Symbols
// ─────────────────────────────────────────────────────────────────────────────

export const icons = {
  success: '✓',
  failure: '✗',
  warning: '⚠',
  star: '★',
  bullet: '-',
} as const;

// ─────────────────────────────────────────────────────────────────────────────
// Box Drawing Characters
// ─────────────────────────────────────────────────────────────────────────────

const box = {
  topLeft: '╭',
  topRight: '╮',
  bottomLeft: '╰',
  bottomRight: '╯',
  horizontal: '─',
  vertical: '│',
} as const;

// ─────────────────────────────────────────────────────────────────────────────
// Helper Functions
// ─────────────────────────────────────────────────────────────────────────────

function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  return str.slice(0, maxLen - 1) + '…';
}

function padRight(str: string, len: number): string {
  return str + ' '.repeat(Math.max(0, len - str.length));
}

function repeat(char: string, count: number): string {
  return char.repeat(Math.max(0, count));
}

// ─────────────────────────────────────────────────────────────────────────────
// Unicode Box
// ─────────────────────────────────────────────────────────────────────────────

export interface BoxOptions {
  title?: string;
  width?: number;
}

/**
 * Format content in a unicode box
 *
 * Example:
 * ╭─ Sync summary ───────────────────────────╮
 * │ ✓ Added:    3                             │
 * ╰──────────────────────────────────────────╯
 */
export function formatBox(lines: string[], options: BoxOptions = {}): string {
  const width = options.width || Math.max(...lines.map((l) => l.length), 40) + 4;
  const innerWidth = width - 2;

  const result: string[] = [];

  if (options.title) {
    const titlePart = `${box.horizontal} ${options.title} `;
    const remainingWidth = width - titlePart.length - 2;
    result.push(`${box.topLeft}${titlePart}${repeat(box.horizontal, remainingWidth)}${box.topRight}`);
  } else {
    result.push(`${box.topLeft}${repeat(box.horizontal, width - 2)}${box.topRight}`);
  }

  // Leave room for a space before the right border
  const contentWidth = innerWidth - 1;
  for (const line of lines) {
    const paddedLine = padRight(line, contentWidth);
    result.push(`${box.vertical} ${truncate(paddedLine, contentWidth)}${box.vertical}`);
  }

  result.push(`${box.bottomLeft}${repeat(box.horizontal, width - 2)}${box.bottomRight}`);

  return result.join('\n');
}

// ─────────────────────────────────────────────────────────────────────────────
// Sync Reports
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Example:
 * ╭─ Sync summary ───────────────────────────╮
 * │ ✓ Added:    2                             │
 * │ ✓ Updated:  14                            │
 * │ ✓ Deleted:  0                             │
 * │ ✗ Failed:   1                             │
 * ╰──────────────────────────────────────────╯
 */
export function renderSummary(stats: SyncStats): string {
  const failedIcon = stats.failed > 0 ? icons.failure : icons.success;
  return formatBox(
    [
      `${icons.success} Added:    ${stats.added}`,
      `${icons.success} Updated:  ${stats.updated}`,
      `${icons.success} Deleted:  ${stats.deleted}`,
      `${failedIcon} Failed:   ${stats.failed}`,
    ],
    { title: 'Sync summary' }
  );
}

/**
 * Numbered list; empty string when nothing failed or was skipped
 */
export function renderFailures(failures: readonly FailureRecord[]): string {
  if (failures.length === 0) return '';

  const lines = [`${icons.warning} Repositories needing attention (${failures.length}):`];
  failures.forEach((failure, index) => {
    lines.push(`  ${index + 1}. ${failure.repo} [${failure.kind}] ${failure.message}`);
  });
  return lines.join('\n');
}

export function formatRepoDetail(detail: RepoDetail): string {
  const parts = [detail.fullName];
  if (detail.language) parts.push(`[${detail.language}]`);
  if (detail.stars !== undefined) parts.push(`${icons.star}${detail.stars}`);
  if (detail.description) parts.push(`- ${detail.description}`);
  return parts.join(' ');
}

export function renderDiffReport(report: DiffReport): string {
  const rate = report.syncRate === undefined ? 'n/a' : `${report.syncRate}%`;
  const lines = [
    'Diff report',
    `  Expected: ${report.totalExpected}  Local: ${report.totalLocal}  Synced: ${report.totalSynced}  Sync rate: ${rate}`,
  ];

  if (report.missing.length > 0) {
    lines.push('', `Missing locally (${report.missing.length}):`);
    for (const detail of report.missing) {
      lines.push(`  ${icons.bullet} ${formatRepoDetail(detail)}`);
    }
  }

  if (report.extra.length > 0) {
    lines.push('', `Not in the group document (${report.extra.length}):`);
    for (const detail of report.extra) {
      lines.push(`  ${icons.bullet} ${report.extraDetailed ? formatRepoDetail(detail) : detail.fullName}`);
    }
  }

  lines.push('');
  if (report.complete) {
    lines.push(`${icons.success} All expected repositories are present locally`);
  } else {
    lines.push(`${icons.warning} ${report.missing.length} missing, ${report.failedCount} failed`);
  }
  return lines.join('\n');
}

/**
 * What a dry run would do; `wouldDelete` comes from a dry-run cleanup
 */
export function renderPlan(plan: SyncPlan, wouldDelete: readonly string[] = []): string {
  const lines = [`Checked ${plan.totalChecked} repositories`];
  const section = (title: string, entries: string[]): void => {
    if (entries.length === 0) return;
    lines.push('', `${title} (${entries.length}):`);
    for (const entry of entries) lines.push(`  ${icons.bullet} ${entry}`);
  };

  section('Would clone', plan.clone.map((task) => task.fullName));
  section('Would update', plan.update.map((task) => task.fullName));
  section('Would move', plan.moved.map((move) => `${move.from} -> ${move.to}`));
  section('Skipped, not a git repository', plan.skipped.map((repo) => repo.path));
  section('Not found on GitHub', plan.notFound.map((repo) => `${repo.name} (${repo.group})`));
  section('Would delete, remote repository gone', [...wouldDelete]);
  return lines.join('\n');
}
