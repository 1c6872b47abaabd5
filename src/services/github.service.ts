/**
 * GitHub Service
 *
 * Talks to GitHub through the GitHub CLI (gh), which owns authentication and
 * protocol selection. JSON output is validated with zod before use.
 */

import { z } from 'zod';
import type { RepoExistence, RepoInfo } from '../core/types.js';
import { createGitHubAuthError, createGitHubResponseError } from '../core/errors.js';
import { summarizeOutput, type CommandResult, type CommandRunner } from '../utils/exec.js';
import { createComponentLogger } from '../utils/logger.js';

const logger = createComponentLogger('github');

export interface GitHubClient {
  /** owner/repo for every repository the account can list, up to `limit` */
  listRepositories(limit: number): Promise<string[]>;
  /** Login of the authenticated user; undefined when gh cannot tell */
  currentUser(): Promise<string | undefined>;
  viewRepository(fullName: string): Promise<RepoInfo | undefined>;
  repositoryExists(fullName: string): Promise<RepoExistence>;
  cloneRepository(fullName: string, dest: string): Promise<CommandResult>;
  /** Sync a fork's branch with its upstream, from inside the clone */
  syncFork(cwd: string, branch: string): Promise<CommandResult>;
}

const REPO_VIEW_FIELDS = [
  'name',
  'description',
  'primaryLanguage',
  'stargazerCount',
  'forkCount',
  'updatedAt',
  'isArchived',
  'isPrivate',
] as const;

const repoListSchema = z.array(z.object({ nameWithOwner: z.string().min(1) }));

const repoViewSchema = z.object({
  name: z.string(),
  description: z.string().nullable().optional(),
  primaryLanguage: z.object({ name: z.string() }).nullable().optional(),
  stargazerCount: z.number().int().optional(),
  forkCount: z.number().int().optional(),
  updatedAt: z.string().nullable().optional(),
  isArchived: z.boolean().optional(),
  isPrivate: z.boolean().optional(),
});

const NOT_FOUND_PATTERN = /could not resolve to a repository|not found/i;

function parseJson(operation: string, text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw createGitHubResponseError(operation, error instanceof Error ? error.message : String(error));
  }
}

export function toRepoInfo(view: z.infer<typeof repoViewSchema>): RepoInfo {
  return {
    name: view.name,
    description: view.description ? view.description : null,
    language: view.primaryLanguage?.name ?? null,
    stargazerCount: view.stargazerCount ?? 0,
    forkCount: view.forkCount ?? 0,
    updatedAt: view.updatedAt ?? null,
    isArchived: view.isArchived ?? false,
    isPrivate: view.isPrivate ?? false,
  };
}

export interface GhCliClientOptions {
  ghBin: string;
}

/**
 * GitHubClient backed by the gh executable
 */
export class GhCliClient implements GitHubClient {
  private userLookup: Promise<string | undefined> | undefined;
  private readonly ghBin: string;

  constructor(
    private readonly runner: CommandRunner,
    options: GhCliClientOptions
  ) {
    this.ghBin = options.ghBin;
  }

  async listRepositories(limit: number): Promise<string[]> {
    const result = await this.runner.run(this.ghBin, [
      'repo',
      'list',
      '--limit',
      String(limit),
      '--json',
      'nameWithOwner',
    ]);

    if (result.exitCode !== 0) {
      throw createGitHubAuthError(summarizeOutput(result));
    }

    const parsed = repoListSchema.safeParse(parseJson('repo list', result.stdout));
    if (!parsed.success) {
      throw createGitHubResponseError('repo list', parsed.error.message);
    }

    logger.debug({ count: parsed.data.length }, 'Listed remote repositories');
    return parsed.data.map((repo) => repo.nameWithOwner);
  }

  currentUser(): Promise<string | undefined> {
    // One lookup per client; concurrent callers share it
    this.userLookup ??= this.runner
      .run(this.ghBin, ['api', 'user', '--jq', '.login'])
      .then((result) => {
        const login = result.stdout.trim();
        if (result.exitCode !== 0 || !login) {
          logger.warn({ reason: summarizeOutput(result) }, 'Could not determine the GitHub user');
          return undefined;
        }
        return login;
      });
    return this.userLookup;
  }

  async viewRepository(fullName: string): Promise<RepoInfo | undefined> {
    const result = await this.runner.run(this.ghBin, [
      'repo',
      'view',
      fullName,
      '--json',
      REPO_VIEW_FIELDS.join(','),
    ]);
    if (result.exitCode !== 0) {
      logger.debug({ repo: fullName, reason: summarizeOutput(result) }, 'Repository details unavailable');
      return undefined;
    }

    // Details are decoration for logs and reports; bad output is not fatal
    let payload: unknown;
    try {
      payload = parseJson('repo view', result.stdout);
    } catch (error) {
      logger.debug({ repo: fullName, error }, 'Unreadable repository details');
      return undefined;
    }

    const parsed = repoViewSchema.safeParse(payload);
    if (!parsed.success) {
      logger.debug({ repo: fullName, issues: parsed.error.issues.length }, 'Unexpected repository details');
      return undefined;
    }
    return toRepoInfo(parsed.data);
  }

  async repositoryExists(fullName: string): Promise<RepoExistence> {
    const result = await this.runner.run(this.ghBin, ['repo', 'view', fullName, '--json', 'name']);
    if (result.exitCode === 0) return 'exists';
    return NOT_FOUND_PATTERN.test(result.stderr) ? 'missing' : 'unknown';
  }

  cloneRepository(fullName: string, dest: string): Promise<CommandResult> {
    return this.runner.run(this.ghBin, ['repo', 'clone', fullName, dest, '--', '--quiet']);
  }

  syncFork(cwd: string, branch: string): Promise<CommandResult> {
    return this.runner.run(this.ghBin, ['repo', 'sync', '--branch', branch], { cwd });
  }
}
