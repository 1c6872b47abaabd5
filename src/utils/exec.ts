/**
 * External command execution
 *
 * Wraps child_process.execFile (no shell, arguments passed as-is) so that
 * services can run gh and git without caring about exit-status plumbing.
 */

import { execFile } from 'node:child_process';
import { createCommandNotFoundError, CommandError } from '../core/errors.js';
import { formatCommandForLogging } from './sanitize.js';
import { createComponentLogger } from './logger.js';

const logger = createComponentLogger('exec');

/** 64 MiB: `gh repo list --limit 1000 --json` output is far below this */
const MAX_BUFFER = 64 * 1024 * 1024;

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Anything that can run an external command.
 * Resolves for every exit status; rejects only when the command cannot start.
 */
export interface CommandRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<CommandResult>;
}

/**
 * execFile reports spawn failures with a string errno code ('ENOENT', 'EACCES')
 * and non-zero exits with the numeric exit status, on the same `code` field.
 */
function errorCode(error: Error): string | number | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' || typeof code === 'number' ? code : undefined;
}

export class ExecFileRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: RunOptions = {}): Promise<CommandResult> {
    logger.debug({ command: formatCommandForLogging(command, args), cwd: options.cwd }, 'Executing command');

    return new Promise((resolve, reject) => {
      execFile(
        command,
        [...args],
        {
          cwd: options.cwd,
          env: options.env ?? { ...process.env, GH_PROMPT_DISABLED: '1', GIT_TERMINAL_PROMPT: '0' },
          encoding: 'utf-8',
          maxBuffer: MAX_BUFFER,
          windowsHide: true,
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ exitCode: 0, stdout, stderr });
            return;
          }

          const code = errorCode(error);
          if (code === 'ENOENT') {
            reject(createCommandNotFoundError(command));
            return;
          }
          if (typeof code === 'string') {
            reject(new CommandError(error.message, command, null));
            return;
          }

          const exitCode = code ?? 1;
          resolve({ exitCode, stdout, stderr });
        }
      );
    });
  }
}

/**
 * First non-empty line of a command's stderr (then stdout), for failure messages
 */
export function summarizeOutput(result: CommandResult): string {
  const lines = `${result.stderr}\n${result.stdout}`
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  return lines[0] ?? `exit code ${result.exitCode}`;
}
