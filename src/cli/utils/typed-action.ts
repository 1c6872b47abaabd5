/**
 * Type-safe action wrapper for Commander.js
 *
 * Commander.js hands action handlers loosely typed option bags; this wrapper
 * gives each command a typed view of its own options and the global ones.
 */

import type { Command } from 'commander';
import type { OutputFormat } from './output.js';

/**
 * Global CLI options available to all commands via --option flags
 */
export interface GlobalOptions {
  /** Group document, overrides REPOS_CONFIG_FILE */
  config?: string;
  /** Directory holding the group folders, overrides REPOS_DIR */
  reposDir?: string;
  format?: OutputFormat;
  /** Suppress everything but warnings and errors on stderr */
  quiet?: boolean;
}

/**
 * Type-safe action wrapper for Commander.js handlers
 *
 * Commands with variadic arguments receive them first, then their options:
 *
 * ```typescript
 * program
 *   .command('check [groups...]')
 *   .option('--strict')
 *   .action(typedAction<{ strict?: boolean }>(async (groups, options, globalOpts) => {
 *     console.log(groups, options.strict, globalOpts.format);
 *   }));
 * ```
 */
export function typedAction<TOptions extends object>(
  handler: (args: string[], options: TOptions, globalOpts: GlobalOptions) => Promise<void>
): (...actionArgs: unknown[]) => Promise<void> {
  return async (...actionArgs: unknown[]) => {
    // Commander passes (...declaredArgs, options, command)
    const cmd = actionArgs[actionArgs.length - 1];
    const options = actionArgs[actionArgs.length - 2];
    const positional = actionArgs.slice(0, -2).flatMap((arg) =>
      Array.isArray(arg) ? arg.filter((item): item is string => typeof item === 'string') : typeof arg === 'string' ? [arg] : []
    );

    // Type assertion is necessary: Commander.js returns loose types from optsWithGlobals()
    const globalOpts = isCommand(cmd) ? (cmd.optsWithGlobals() as GlobalOptions) : {};
    await handler(positional, options as TOptions, globalOpts);
  };
}

function isCommand(value: unknown): value is Command {
  return typeof value === 'object' && value !== null && 'optsWithGlobals' in value;
}
