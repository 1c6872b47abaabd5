/**
 * Clone CLI Command
 *
 * Clone missing repositories and update existing ones, group by group.
 */

import { Command, InvalidArgumentError } from 'commander';
import { config } from '../../config/index.js';
import { syncGroups, type SyncRunResult } from '../../services/workflow.service.js';
import { renderDiffReport, renderFailures, renderPlan, renderSummary } from '../../utils/terminal-formatter.js';
import { createCliContext } from '../utils/context.js';
import { printOutput } from '../utils/output.js';
import { handleCliError } from '../utils/errors.js';
import { typedAction } from '../utils/typed-action.js';

interface CloneOptions {
  jobs?: number;
  cleanup?: boolean;
  dryRun?: boolean;
}

export function parseJobs(value: string): number {
  const jobs = Number(value);
  if (!Number.isInteger(jobs) || jobs < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return jobs;
}

export function renderSyncRun(run: SyncRunResult): string {
  if (!run.result) {
    return [renderPlan(run.plan, run.cleanup?.deleted), renderDiffReport(run.report)].join('\n\n');
  }
  return [renderSummary(run.result.stats), renderFailures(run.result.failures), renderDiffReport(run.report)]
    .filter((section) => section.length > 0)
    .join('\n\n');
}

export function addCloneCommand(program: Command): void {
  program
    .command('clone')
    .description('Clone missing repositories and update existing ones')
    .argument('[groups...]', 'Group names or name fragments (default: all groups)')
    .option('-j, --jobs <n>', 'Repositories processed in parallel', parseJobs)
    .option('--no-cleanup', 'Keep local clones whose remote repository was deleted')
    .option('--dry-run', 'Show what would be done without changing anything', false)
    .action(
      typedAction<CloneOptions>(async (groups, options, globalOpts) => {
        try {
          const context = createCliContext(globalOpts);
          const run = await syncGroups(
            { github: context.github, git: context.git },
            {
              configPath: context.configPath,
              baseDir: context.baseDir,
              reposDir: context.reposDir,
              groups,
              jobs: options.jobs ?? config.sync.parallelJobs,
              cleanup: (options.cleanup ?? true) && config.sync.cleanup,
              dryRun: options.dryRun ?? false,
              listLimit: config.github.listLimit,
              extraDetailLimit: config.sync.extraDetailLimit,
              tuneGit: config.github.tuneGit,
            }
          );

          printOutput(run, context.format, renderSyncRun);

          if (run.result && run.result.stats.failed > 0) {
            process.exitCode = 1;
          }
        } catch (error) {
          handleCliError(error, globalOpts.format);
        }
      })
    );
}
