import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { readLongDescription, FALLBACK_DESCRIPTION, VERSION, README_PATH } from '../../src/package-info.js';
import { createTempDir, writeFile } from '../fixtures/index.js';

describe('readLongDescription', () => {
  let tmp: ReturnType<typeof createTempDir>;

  beforeEach(() => {
    tmp = createTempDir();
  });

  afterEach(() => {
    tmp.cleanup();
  });

  it('should return the README contents when present', () => {
    const path = writeFile(join(tmp.dir, 'README.md'), '# repos\n\nMirror groups of repositories.\n');
    expect(readLongDescription(path)).toBe('# repos\n\nMirror groups of repositories.\n');
  });

  it('should return the fallback when the README is absent', () => {
    expect(readLongDescription(join(tmp.dir, 'README.md'))).toBe(
      'GitHub repository batch classification clone script'
    );
    expect(FALLBACK_DESCRIPTION).toBe('GitHub repository batch classification clone script');
  });

  it('should look for README.md at the package root by default', () => {
    expect(README_PATH.endsWith('README.md')).toBe(true);
  });
});

describe('VERSION', () => {
  it('should come from package.json', () => {
    expect(VERSION).toBe('1.0.0');
  });
});
