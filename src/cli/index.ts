/**
 * CLI Main Program
 *
 * Commander.js program setup for the repos CLI.
 */

import { Command, CommanderError, Option } from 'commander';

import { addCloneCommand } from './commands/clone.js';
import { addCheckCommand } from './commands/check.js';
import { addGroupsCommand } from './commands/groups.js';
import { addAboutCommand } from './commands/about.js';
import { OUTPUT_FORMATS, isOutputFormat, type OutputFormat } from './utils/output.js';
import { handleCliError } from './utils/errors.js';
import { VERSION } from '../package-info.js';

/**
 * Create the Commander.js program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('repos')
    .description('Clone and update GitHub repositories organised into groups')
    .version(VERSION)
    .option('-c, --config <file>', 'Group document (default: REPOS_CONFIG_FILE or REPO-GROUPS.md)')
    .option('-d, --repos-dir <dir>', 'Directory holding the group folders (default: REPOS_DIR or repos)')
    .addOption(
      new Option('--format <format>', 'Output format').choices([...OUTPUT_FORMATS]).default('text')
    )
    .option('-q, --quiet', 'Only log warnings and errors', false)
    // Parse errors are thrown and reported by runCli; subcommands inherit both settings
    .exitOverride()
    .configureOutput({ outputError: () => {} });

  registerCommands(program);

  return program;
}

/**
 * Register all subcommands
 */
function registerCommands(program: Command): void {
  addCloneCommand(program);
  addCheckCommand(program);
  addGroupsCommand(program);
  addAboutCommand(program);
}

/** Commander has already printed help or the version for these */
const OUTPUT_ONLY_CODES = new Set(['commander.helpDisplayed', 'commander.help', 'commander.version']);

function selectedFormat(program: Command): OutputFormat {
  const format: unknown = program.opts().format;
  return typeof format === 'string' && isOutputFormat(format) ? format : 'text';
}

/**
 * Run the CLI program
 */
export async function runCli(argv: string[]): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError && OUTPUT_ONLY_CODES.has(error.code)) {
      process.exitCode = error.exitCode;
      return;
    }
    handleCliError(error, selectedFormat(program));
  }
}
