import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { cleanupDeletedRepos, listClones } from '../../src/services/cleanup.service.js';
import { RemoteIndex } from '../../src/services/remote-index.service.js';
import { FakeGitHub, createTempDir, makeGitRepo } from '../fixtures/index.js';

describe('listClones', () => {
  let tmp: ReturnType<typeof createTempDir>;

  beforeEach(() => {
    tmp = createTempDir();
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it('should list only directories with a .git inside', () => {
    makeGitRepo(join(tmp.dir, 'a'));
    mkdirSync(join(tmp.dir, 'plain'));
    writeFileSync(join(tmp.dir, 'file.txt'), 'x');

    expect(listClones(tmp.dir)).toEqual([join(tmp.dir, 'a')]);
  });

  it('should return nothing for a missing folder', () => {
    expect(listClones(join(tmp.dir, 'missing'))).toEqual([]);
  });
});

describe('cleanupDeletedRepos', () => {
  let tmp: ReturnType<typeof createTempDir>;
  let folder: string;
  let github: FakeGitHub;

  beforeEach(() => {
    tmp = createTempDir();
    folder = join(tmp.dir, 'Tools');
    github = new FakeGitHub(['octo/kept', 'octo/listed']);
    makeGitRepo(join(folder, 'kept'));
    makeGitRepo(join(folder, 'listed'));
    makeGitRepo(join(folder, 'deleted'));
  });

  afterEach(() => {
    tmp.cleanup();
  });

  function run(dryRun = false) {
    return cleanupDeletedRepos({
      groupFolders: [folder],
      expectedPaths: new Set([join(folder, 'kept')]),
      index: new RemoteIndex(github, github.repos),
      client: github,
      dryRun,
    });
  }

  it('should delete clones whose remote is gone and keep the rest', async () => {
    const result = await run();

    expect(result.deleted).toEqual([join(folder, 'deleted')]);
    expect(result.kept).toEqual([join(folder, 'listed')]);
    expect(existsSync(join(folder, 'deleted'))).toBe(false);
    expect(existsSync(join(folder, 'kept'))).toBe(true);
    expect(github.existenceChecks).toEqual(['octo/deleted']);
  });

  it('should only report on a dry run', async () => {
    const result = await run(true);

    expect(result.deleted).toEqual([join(folder, 'deleted')]);
    expect(existsSync(join(folder, 'deleted'))).toBe(true);
  });

  it('should keep a clone when the remote status is unknown', async () => {
    github.existence.set('octo/deleted', 'unknown');

    const result = await run();

    expect(result.deleted).toEqual([]);
    expect(result.kept).toContain(join(folder, 'deleted'));
  });

  it('should keep everything when the current user is unknown', async () => {
    github.user = undefined;

    expect((await run()).deleted).toEqual([]);
    expect(github.existenceChecks).toEqual([]);
  });
});
