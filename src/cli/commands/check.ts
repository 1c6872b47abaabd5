/**
 * Check CLI Command
 *
 * Compare the group document with the local clones without changing anything.
 */

import { Command } from 'commander';
import { config } from '../../config/index.js';
import { checkGroups } from '../../services/workflow.service.js';
import { renderDiffReport } from '../../utils/terminal-formatter.js';
import { createCliContext } from '../utils/context.js';
import { printOutput } from '../utils/output.js';
import { handleCliError } from '../utils/errors.js';
import { typedAction } from '../utils/typed-action.js';

interface CheckOptions {
  strict?: boolean;
}

export function addCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Report missing and extra repositories (read-only)')
    .argument('[groups...]', 'Group names or name fragments (default: all groups)')
    .option('--strict', 'Exit with status 1 unless every expected repository is present', false)
    .action(
      typedAction<CheckOptions>(async (groups, options, globalOpts) => {
        try {
          const context = createCliContext(globalOpts);
          const run = await checkGroups(context.github, {
            configPath: context.configPath,
            reposDir: context.reposDir,
            groups,
            listLimit: config.github.listLimit,
            extraDetailLimit: config.sync.extraDetailLimit,
          });

          printOutput(run, context.format, (result) => renderDiffReport(result.report));

          if (options.strict && !run.report.complete) {
            process.exitCode = 1;
          }
        } catch (error) {
          handleCliError(error, globalOpts.format);
        }
      })
    );
}
