/**
 * Remote Index Service
 *
 * Maps bare repository names (as written in the group document) to their
 * owner/repo names. The account listing is fetched once per run; names missing
 * from it are looked up under the authenticated user and remembered.
 */

import { withRetry, isRetryableNetworkError, type RetryOptions } from '../utils/retry.js';
import { createComponentLogger } from '../utils/logger.js';
import type { GitHubClient } from './github.service.js';

const logger = createComponentLogger('remote-index');

export function repoBaseName(fullName: string): string {
  const slash = fullName.lastIndexOf('/');
  return slash === -1 ? fullName : fullName.slice(slash + 1);
}

export class RemoteIndex {
  private readonly byName = new Map<string, string>();

  constructor(
    private readonly client: GitHubClient,
    fullNames: Iterable<string> = []
  ) {
    for (const fullName of fullNames) {
      // Later entries win when two owners share a repository name
      this.byName.set(repoBaseName(fullName), fullName);
    }
  }

  /**
   * Fetch the account listing (with retry on transient failures) and index it
   */
  static async load(
    client: GitHubClient,
    limit: number,
    retry: RetryOptions = {}
  ): Promise<RemoteIndex> {
    const fullNames = await withRetry(() => client.listRepositories(limit), {
      operation: 'gh repo list',
      retryableErrors: isRetryableNetworkError,
      ...retry,
    });
    const index = new RemoteIndex(client, fullNames);
    logger.info({ count: index.size }, 'Cached remote repositories');
    if (fullNames.length >= limit) {
      logger.warn({ limit }, 'Listing hit the limit; some repositories may be missing from the index');
    }
    return index;
  }

  get size(): number {
    return this.byName.size;
  }

  /** Cache-only lookup */
  lookup(name: string): string | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Cached lookup, falling back to <current user>/<name> on GitHub
   */
  async resolve(name: string): Promise<string | undefined> {
    const cached = this.byName.get(name);
    if (cached) return cached;

    const owner = await this.client.currentUser();
    if (!owner) return undefined;

    const candidate = `${owner}/${name}`;
    if ((await this.client.repositoryExists(candidate)) !== 'exists') {
      return undefined;
    }

    this.byName.set(name, candidate);
    logger.debug({ repo: candidate }, 'Resolved repository outside the listing');
    return candidate;
  }
}
