/**
 * Group Config Service
 *
 * Parses the markdown group document (REPO-GROUPS.md):
 *
 *   ## Backend Services <!-- 1高地 -->
 *   - api-gateway
 *   - billing-worker
 *
 *   ## Tools
 *   - dotfiles
 *
 * Level-2 headings start a group; every non-empty line below one is a
 * repository name (a leading "-" bullet is dropped). An HTML comment on the
 * heading carries the group's highland tag, used in the folder name.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { GroupConfig, RepoGroup } from '../core/types.js';
import { createConfigNotFoundError, createGroupNotFoundError, createNoGroupsError } from '../core/errors.js';

const GROUP_HEADING = /^##\s/;
const HEADING_COMMENT = /<!--\s*(.*?)\s*-->/;
const NUMBERED_HIGHLAND = /^([0-9]+\.?[0-9]*)高地$/;
const BULLET = /^\s*-\s*/;

/**
 * "3高地" and "2.5高地" become "3号高地" and "2.5号高地"; other tags are kept as written
 */
export function normalizeHighland(tag: string): string {
  const match = NUMBERED_HIGHLAND.exec(tag);
  return match ? `${match[1]}号高地` : tag;
}

function parseHeading(line: string): RepoGroup {
  const name = line
    .replace(/^##\s+/, '')
    .replace(/ ?<!--.*$/, '')
    .trim();

  const comment = HEADING_COMMENT.exec(line)?.[1];
  const group: RepoGroup = { name, repos: [] };
  if (comment) {
    group.highland = normalizeHighland(comment);
  }
  return group;
}

export function parseGroupConfig(text: string): GroupConfig {
  const groups: RepoGroup[] = [];
  let current: RepoGroup | undefined;

  for (const rawLine of text.split(/\r?\n/)) {
    if (GROUP_HEADING.test(rawLine)) {
      current = parseHeading(rawLine);
      groups.push(current);
      continue;
    }

    // Anything before the first group heading is prose
    if (!current) continue;

    const repo = rawLine.replace(BULLET, '').trim();
    if (repo) {
      current.repos.push(repo);
    }
  }

  return { groups };
}

/**
 * Read and parse the group document; a document without groups is an error
 */
export function loadGroupConfig(path: string): GroupConfig {
  if (!existsSync(path)) {
    throw createConfigNotFoundError(path);
  }
  const config = parseGroupConfig(readFileSync(path, 'utf-8'));
  if (config.groups.length === 0) {
    throw createNoGroupsError(path);
  }
  return config;
}

/**
 * Resolve user input to a group: exact name first, then the first group whose
 * name contains the input (case-insensitive).
 */
export function findGroup(config: GroupConfig, input: string): RepoGroup | undefined {
  const exact = config.groups.find((group) => group.name === input);
  if (exact) return exact;

  const needle = input.toLowerCase();
  return config.groups.find((group) => group.name.toLowerCase().includes(needle));
}

/**
 * Groups named on the command line, in document order; every group when none
 * are named
 */
export function selectGroups(config: GroupConfig, inputs: readonly string[]): RepoGroup[] {
  if (inputs.length === 0) return [...config.groups];

  const selected = new Set<RepoGroup>();
  for (const input of inputs) {
    const group = findGroup(config, input);
    if (!group) {
      throw createGroupNotFoundError(
        input,
        config.groups.map((g) => g.name)
      );
    }
    selected.add(group);
  }
  return config.groups.filter((group) => selected.has(group));
}

/**
 * Folder for a group: "<reposDir>/<name> (<highland>)" or "<reposDir>/<name>"
 */
export function groupFolder(group: RepoGroup, reposDir: string): string {
  const folderName = group.highland ? `${group.name} (${group.highland})` : group.name;
  return join(reposDir, folderName);
}

/**
 * Every path the document expects a clone at, across all groups
 */
export function expectedRepoPaths(config: GroupConfig, reposDir: string): Set<string> {
  const paths = new Set<string>();
  for (const group of config.groups) {
    const folder = groupFolder(group, reposDir);
    for (const repo of group.repos) {
      paths.add(join(folder, repo));
    }
  }
  return paths;
}

/**
 * One line per group, numbered from 1: " 1. Backend Services (1号高地)"
 */
export function formatGroupList(config: GroupConfig): string[] {
  return config.groups.map((group, index) => {
    const number = String(index + 1).padStart(2, ' ');
    return group.highland
      ? `${number}. ${group.name} (${group.highland})`
      : `${number}. ${group.name}`;
  });
}
