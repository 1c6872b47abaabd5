/**
 * CLI Context Utilities
 *
 * Resolves paths and output settings from global options and configuration,
 * and wires the gh/git clients for a single CLI invocation.
 */

import { resolve } from 'node:path';
import { config } from '../../config/index.js';
import { ExecFileRunner, type CommandRunner } from '../../utils/exec.js';
import { GitClient } from '../../utils/git.js';
import { GhCliClient, type GitHubClient } from '../../services/github.service.js';
import { setLogLevel } from '../../utils/logger.js';
import { isOutputFormat, type OutputFormat } from './output.js';
import type { GlobalOptions } from './typed-action.js';

export interface CliContext {
  /** Working directory; relative paths resolve against it */
  baseDir: string;
  configPath: string;
  reposDir: string;
  format: OutputFormat;
  github: GitHubClient;
  git: GitClient;
}

export function createCliContext(
  globalOpts: GlobalOptions,
  runner: CommandRunner = new ExecFileRunner(),
  baseDir: string = process.cwd()
): CliContext {
  if (globalOpts.quiet) {
    setLogLevel('warn');
  }

  const format = globalOpts.format !== undefined && isOutputFormat(globalOpts.format) ? globalOpts.format : 'text';

  return {
    baseDir,
    configPath: resolve(baseDir, globalOpts.config ?? config.sync.configFile),
    reposDir: resolve(baseDir, globalOpts.reposDir ?? config.sync.reposDir),
    format,
    github: new GhCliClient(runner, { ghBin: config.github.ghBin }),
    git: new GitClient(runner, config.github.gitBin),
  };
}
