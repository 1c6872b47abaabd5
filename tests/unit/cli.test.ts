import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { InvalidArgumentError } from 'commander';
import { join } from 'node:path';
import { createProgram, runCli } from '../../src/cli/index.js';
import { parseJobs, renderSyncRun } from '../../src/cli/commands/clone.js';
import { formatOutput, isOutputFormat } from '../../src/cli/utils/output.js';
import { readLongDescription } from '../../src/package-info.js';
import type { SyncRunResult } from '../../src/services/workflow.service.js';
import { createTempDir, writeFile } from '../fixtures/index.js';

describe('createProgram', () => {
  it('should register the repos subcommands and global options', () => {
    const program = createProgram();

    expect(program.name()).toBe('repos');
    expect(program.commands.map((cmd) => cmd.name())).toEqual(['clone', 'check', 'groups', 'about']);
    expect(program.options.map((opt) => opt.long)).toEqual([
      '--version',
      '--config',
      '--repos-dir',
      '--format',
      '--quiet',
    ]);
  });

  it('should give clone its own options', () => {
    const clone = createProgram().commands.find((cmd) => cmd.name() === 'clone');
    expect(clone?.options.map((opt) => opt.long)).toEqual(['--jobs', '--no-cleanup', '--dry-run']);
  });
});

describe('parseJobs', () => {
  it('should accept positive integers', () => {
    expect(parseJobs('3')).toBe(3);
  });

  it('should reject anything else', () => {
    expect(() => parseJobs('0')).toThrow(InvalidArgumentError);
    expect(() => parseJobs('two')).toThrow(InvalidArgumentError);
    expect(() => parseJobs('1.5')).toThrow(InvalidArgumentError);
  });
});

describe('output', () => {
  it('should recognise the output formats', () => {
    expect(isOutputFormat('json')).toBe(true);
    expect(isOutputFormat('table')).toBe(false);
  });

  it('should print JSON or hand over to the text renderer', () => {
    expect(formatOutput({ a: 1 }, 'json')).toBe('{\n  "a": 1\n}');
    expect(formatOutput({ a: 1 }, 'text', (value) => `a=${value.a}`)).toBe('a=1');
    expect(formatOutput({ a: 1, b: undefined })).toBe('a: 1');
  });
});

describe('renderSyncRun', () => {
  const report = {
    totalExpected: 1,
    totalLocal: 1,
    totalSynced: 1,
    missing: [],
    extra: [],
    extraDetailed: true,
    failedCount: 0,
    syncRate: 100,
    complete: true,
  };
  const plan = {
    clone: [],
    update: [],
    skipped: [],
    notFound: [],
    moved: [],
    groupFolders: [],
    totalChecked: 1,
  };

  it('should skip the failure section when nothing failed', () => {
    const run: SyncRunResult = {
      groups: ['Tools'],
      dryRun: false,
      plan,
      result: { stats: { added: 0, updated: 1, deleted: 0, failed: 0 }, failures: [], retried: 0, recovered: 0 },
      report,
    };

    const sections = renderSyncRun(run).split('\n\n');
    expect(sections[0]?.startsWith('╭─ Sync summary')).toBe(true);
    expect(sections[1]).toBe('Diff report\n  Expected: 1  Local: 1  Synced: 1  Sync rate: 100%');
  });

  it('should render the plan on a dry run', () => {
    const run: SyncRunResult = { groups: ['Tools'], dryRun: true, plan, report };
    expect(renderSyncRun(run).startsWith('Checked 1 repositories\n\nDiff report')).toBe(true);
  });
});

describe('runCli', () => {
  let tmp: ReturnType<typeof createTempDir>;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    tmp = createTempDir();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    tmp.cleanup();
  });

  it('groups should print the numbered group list', async () => {
    const doc = writeFile(join(tmp.dir, 'groups.md'), '## Tools\n- a\n## Web <!-- 2高地 -->\n- site\n');

    await runCli(['--config', doc, 'groups']);

    expect(consoleLogSpy).toHaveBeenCalledWith(' 1. Tools\n 2. Web (2号高地)');
  });

  it('groups should print JSON with --format json', async () => {
    const doc = writeFile(join(tmp.dir, 'groups.md'), '## Tools\n- a\n');

    await runCli(['--format', 'json', '--config', doc, 'groups']);

    expect(consoleLogSpy).toHaveBeenCalledWith(
      JSON.stringify({ groups: [{ name: 'Tools', repos: ['a'] }] }, null, 2)
    );
  });

  it('should report a missing group document on stderr', async () => {
    const missing = join(tmp.dir, 'missing.md');

    await expect(runCli(['--config', missing, 'groups'])).rejects.toThrow('process.exit called');

    expect(process.exit).toHaveBeenCalledWith(1);
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      `Error [E2000]: Group document not found: ${missing}\n` +
        'Hint: Create it from REPO-GROUPS.md.example or pass --config <file>'
    );
  });

  it('should report errors as JSON with --format json', async () => {
    const missing = join(tmp.dir, 'missing.md');

    await expect(runCli(['--format', 'json', '--config', missing, 'groups'])).rejects.toThrow(
      'process.exit called'
    );

    const output = String(consoleErrorSpy.mock.calls[0]?.[0]);
    expect(JSON.parse(output)).toMatchObject({ error: `Group document not found: ${missing}`, code: 'E2000' });
  });

  it('should exit 2 for an unknown group', async () => {
    const doc = writeFile(join(tmp.dir, 'groups.md'), '## Tools\n- a\n');

    await expect(runCli(['--config', doc, 'check', 'nope'])).rejects.toThrow('process.exit called');

    expect(process.exit).toHaveBeenCalledWith(2);
  });

  it('should exit 2 for an invalid --jobs value', async () => {
    await expect(runCli(['clone', '--jobs', '0'])).rejects.toThrow('process.exit called');

    expect(process.exit).toHaveBeenCalledWith(2);
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      "Error [E1000]: option '-j, --jobs <n>' argument '0' is invalid. Expected a positive integer."
    );
  });

  it('should exit 2 for an unknown option', async () => {
    await expect(runCli(['groups', '--bogus'])).rejects.toThrow('process.exit called');

    expect(process.exit).toHaveBeenCalledWith(2);
    expect(consoleErrorSpy).toHaveBeenCalledWith(expect.stringMatching(/^Error \[E1000\]: unknown option '--bogus'/));
  });

  it('should print the version without treating it as an error', async () => {
    const writeSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    await runCli(['--version']);

    expect(writeSpy).toHaveBeenCalledWith('1.0.0\n');
    expect(process.exit).not.toHaveBeenCalled();
    process.exitCode = undefined;
  });

  it('about should print the long description', async () => {
    await runCli(['about']);
    expect(consoleLogSpy).toHaveBeenCalledWith(readLongDescription().trimEnd());
  });
});

describe('invalid configuration', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
    vi.restoreAllMocks();
  });

  it('should still be reported through the CLI error handler with exit status 2', async () => {
    vi.resetModules();
    vi.stubEnv('PARALLEL_JOBS', '0');
    const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });

    const loadError = await import('../../src/config/index.js').then(
      () => undefined,
      (error: unknown) => error
    );
    const { handleCliError } = await import('../../src/cli/utils/errors.js');

    expect(() => handleCliError(loadError)).toThrow('process.exit called');
    expect(process.exit).toHaveBeenCalledWith(2);
    const output = String(consoleErrorSpy.mock.calls[0]?.[0]);
    expect(output.split('\n')[0]).toBe('Error [E1001]: Invalid configuration:');
    expect(output).toContain('  - sync.parallelJobs: ');
  });
});
