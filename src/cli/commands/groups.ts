/**
 * Groups CLI Command
 */

import { Command } from 'commander';
import { formatGroupList, loadGroupConfig } from '../../services/group-config.service.js';
import { createCliContext } from '../utils/context.js';
import { printOutput } from '../utils/output.js';
import { handleCliError } from '../utils/errors.js';
import { typedAction } from '../utils/typed-action.js';

export function addGroupsCommand(program: Command): void {
  program
    .command('groups')
    .description('List the groups in the group document')
    .action(
      typedAction(async (_args, _options, globalOpts) => {
        try {
          const context = createCliContext(globalOpts);
          const groupConfig = loadGroupConfig(context.configPath);
          printOutput(groupConfig, context.format, (result) => formatGroupList(result).join('\n'));
        } catch (error) {
          handleCliError(error, globalOpts.format);
        }
      })
    );
}
