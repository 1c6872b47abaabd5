import { describe, it, expect } from 'vitest';
import { summarizeOutput } from '../../src/utils/exec.js';

describe('summarizeOutput', () => {
  it('should prefer the first non-empty stderr line', () => {
    expect(
      summarizeOutput({ exitCode: 1, stdout: 'progress', stderr: '\n  fatal: repository not found  \nmore' })
    ).toBe('fatal: repository not found');
  });

  it('should fall back to stdout', () => {
    expect(summarizeOutput({ exitCode: 1, stdout: 'CONFLICT (content)\n', stderr: '' })).toBe('CONFLICT (content)');
  });

  it('should report the exit code when there is no output', () => {
    expect(summarizeOutput({ exitCode: 128, stdout: '', stderr: '  \n' })).toBe('exit code 128');
  });
});
