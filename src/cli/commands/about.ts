/**
 * About CLI Command
 */

import { Command } from 'commander';
import { readLongDescription, VERSION } from '../../package-info.js';
import { printOutput } from '../utils/output.js';
import { handleCliError } from '../utils/errors.js';
import { typedAction } from '../utils/typed-action.js';

export function addAboutCommand(program: Command): void {
  program
    .command('about')
    .description('Show the project description')
    .action(
      typedAction(async (_args, _options, globalOpts) => {
        try {
          const about = { version: VERSION, description: readLongDescription() };
          printOutput(about, globalOpts.format, (result) => result.description.trimEnd());
        } catch (error) {
          handleCliError(error, globalOpts.format);
        }
      })
    );
}
