import { describe, it, expect } from 'vitest';
import { RemoteIndex, repoBaseName } from '../../src/services/remote-index.service.js';
import { FakeGitHub } from '../fixtures/index.js';

describe('repoBaseName', () => {
  it('should strip the owner', () => {
    expect(repoBaseName('octo/tool')).toBe('tool');
    expect(repoBaseName('tool')).toBe('tool');
  });
});

describe('RemoteIndex', () => {
  it('should index the listing by repository name', async () => {
    const github = new FakeGitHub(['octo/a', 'org/b']);
    const index = await RemoteIndex.load(github, 1000);

    expect(index.size).toBe(2);
    expect(index.lookup('b')).toBe('org/b');
    expect(index.has('a')).toBe(true);
    expect(index.lookup('c')).toBeUndefined();
  });

  it('should let the later entry win for duplicate names', () => {
    const index = new RemoteIndex(new FakeGitHub(), ['octo/tool', 'org/tool']);
    expect(index.lookup('tool')).toBe('org/tool');
  });

  it('should retry a transient listing failure', async () => {
    const github = new FakeGitHub(['octo/a']);
    let failures = 1;
    const list = github.listRepositories.bind(github);
    github.listRepositories = async (limit: number) => {
      if (failures-- > 0) throw new Error('connection reset by peer');
      return list(limit);
    };

    const index = await RemoteIndex.load(github, 10, { initialDelayMs: 1 });
    expect(index.lookup('a')).toBe('octo/a');
    expect(github.listCalls).toBe(1);
  });

  it('should not retry an authentication failure', async () => {
    const github = new FakeGitHub();
    github.listError = new Error('Unable to list repositories: gh auth login');

    await expect(RemoteIndex.load(github, 10, { initialDelayMs: 1 })).rejects.toThrow('gh auth login');
    expect(github.listCalls).toBe(1);
  });

  describe('resolve', () => {
    it('should answer from the cache without calling GitHub', async () => {
      const github = new FakeGitHub();
      const index = new RemoteIndex(github, ['org/a']);

      expect(await index.resolve('a')).toBe('org/a');
      expect(github.existenceChecks).toEqual([]);
    });

    it('should fall back to the current user and remember a hit', async () => {
      const github = new FakeGitHub();
      github.existence.set('octo/hidden', 'exists');
      const index = new RemoteIndex(github, []);

      expect(await index.resolve('hidden')).toBe('octo/hidden');
      expect(await index.resolve('hidden')).toBe('octo/hidden');
      expect(github.existenceChecks).toEqual(['octo/hidden']);
      expect(index.has('hidden')).toBe(true);
    });

    it('should return undefined when the repository is missing or status is unknown', async () => {
      const github = new FakeGitHub();
      github.existence.set('octo/flaky', 'unknown');
      const index = new RemoteIndex(github, []);

      expect(await index.resolve('nope')).toBeUndefined();
      expect(await index.resolve('flaky')).toBeUndefined();
    });

    it('should return undefined when there is no current user', async () => {
      const github = new FakeGitHub();
      github.user = undefined;
      expect(await new RemoteIndex(github, []).resolve('x')).toBeUndefined();
      expect(github.existenceChecks).toEqual([]);
    });
  });
});
