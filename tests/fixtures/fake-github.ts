import type { CommandResult } from '../../src/utils/exec.js';
import type { RepoExistence, RepoInfo } from '../../src/core/types.js';
import type { GitHubClient } from '../../src/services/github.service.js';
import { ok } from './fake-runner.js';

export function repoInfo(overrides: Partial<RepoInfo> = {}): RepoInfo {
  return {
    name: 'demo',
    description: null,
    language: null,
    stargazerCount: 0,
    forkCount: 0,
    updatedAt: null,
    isArchived: false,
    isPrivate: false,
    ...overrides,
  };
}

/**
 * In-memory GitHubClient: `repos` is the account listing, `details` feeds
 * viewRepository, `existence` overrides repositoryExists per full name.
 */
export class FakeGitHub implements GitHubClient {
  user: string | undefined = 'octo';
  repos: string[] = [];
  details = new Map<string, RepoInfo>();
  existence = new Map<string, RepoExistence>();
  cloneResult: CommandResult = ok();
  syncResult: CommandResult = ok();
  listError: Error | undefined;

  readonly cloned: Array<{ fullName: string; dest: string }> = [];
  readonly existenceChecks: string[] = [];
  listCalls = 0;

  constructor(repos: string[] = []) {
    this.repos = repos;
  }

  async listRepositories(limit: number): Promise<string[]> {
    this.listCalls++;
    if (this.listError) throw this.listError;
    return this.repos.slice(0, limit);
  }

  async currentUser(): Promise<string | undefined> {
    return this.user;
  }

  async viewRepository(fullName: string): Promise<RepoInfo | undefined> {
    return this.details.get(fullName);
  }

  async repositoryExists(fullName: string): Promise<RepoExistence> {
    this.existenceChecks.push(fullName);
    return this.existence.get(fullName) ?? (this.repos.includes(fullName) ? 'exists' : 'missing');
  }

  async cloneRepository(fullName: string, dest: string): Promise<CommandResult> {
    this.cloned.push({ fullName, dest });
    return this.cloneResult;
  }

  async syncFork(_cwd: string, _branch: string): Promise<CommandResult> {
    return this.syncResult;
  }
}
