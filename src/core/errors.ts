/**
 * Core error definitions
 *
 * Error classes, codes and factory functions shared by the services and the CLI.
 * Per-repository failures are not thrown through here; they are collected as
 * FailureRecords by the sync executor.
 */

export class ReposError extends Error {
  constructor(
    message: string,
    public code: string,
    public context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ReposError';
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error codes for programmatic handling
 */
export const ErrorCodes = {
  // Validation errors (1000-1999)
  INVALID_PARAMETER: 'E1000',
  INVALID_CONFIG: 'E1001',

  // Resource errors (2000-2999)
  CONFIG_NOT_FOUND: 'E2000',
  GROUP_NOT_FOUND: 'E2001',
  NO_GROUPS: 'E2002',

  // Command errors (3000-3999)
  COMMAND_NOT_FOUND: 'E3000',
  COMMAND_FAILED: 'E3001',

  // GitHub errors (4000-4999)
  GITHUB_AUTH_REQUIRED: 'E4000',
  GITHUB_RESPONSE_INVALID: 'E4001',

  // System errors (5000-5999)
  UNKNOWN_ERROR: 'E5000',
  INTERNAL_ERROR: 'E5001',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// =============================================================================
// SPECIALIZED ERROR CLASSES
// =============================================================================

/**
 * External command (gh, git) could not run or exited unsuccessfully
 */
export class CommandError extends ReposError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number | null,
    code: string = ErrorCodes.COMMAND_FAILED,
    context?: Record<string, unknown>
  ) {
    super(message, code, { ...context, command, exitCode });
    this.name = 'CommandError';
  }
}

// =============================================================================
// FACTORIES
// =============================================================================

/**
 * Create a validation error with helpful context
 */
export function createValidationError(
  field: string,
  message: string,
  suggestion?: string
): ReposError {
  return new ReposError(
    `Validation error: ${field} - ${message}${suggestion ? `. Suggestion: ${suggestion}` : ''}`,
    ErrorCodes.INVALID_PARAMETER,
    { field, suggestion }
  );
}

export function createInvalidConfigError(problems: string[]): ReposError {
  return new ReposError(
    `Invalid configuration:\n${problems.map((problem) => `  - ${problem}`).join('\n')}`,
    ErrorCodes.INVALID_CONFIG,
    { problems, suggestion: 'Check the REPOS_*, PARALLEL_JOBS and LOG_LEVEL settings in the environment or .env' }
  );
}

export function createConfigNotFoundError(path: string): ReposError {
  return new ReposError(`Group document not found: ${path}`, ErrorCodes.CONFIG_NOT_FOUND, {
    path,
    suggestion: 'Create it from REPO-GROUPS.md.example or pass --config <file>',
  });
}

export function createGroupNotFoundError(input: string, available: string[]): ReposError {
  return new ReposError(`Group not found: ${input}`, ErrorCodes.GROUP_NOT_FOUND, {
    input,
    available,
    suggestion: 'Run `repos groups` to list the configured groups',
  });
}

export function createNoGroupsError(path: string): ReposError {
  return new ReposError(`No groups found in ${path}`, ErrorCodes.NO_GROUPS, {
    path,
    suggestion: 'Groups are level-2 headings: "## Group name"',
  });
}

export function createCommandNotFoundError(command: string): CommandError {
  return new CommandError(
    `Command not found: ${command}`,
    command,
    null,
    ErrorCodes.COMMAND_NOT_FOUND,
    { suggestion: `Install ${command} and make sure it is on PATH` }
  );
}

export function createGitHubAuthError(detail?: string): ReposError {
  return new ReposError(
    `Unable to list repositories${detail ? `: ${detail}` : ''}`,
    ErrorCodes.GITHUB_AUTH_REQUIRED,
    { suggestion: 'Make sure the GitHub CLI is logged in (run: gh auth login)' }
  );
}

export function createGitHubResponseError(operation: string, detail: string): ReposError {
  return new ReposError(
    `Unexpected GitHub CLI output for ${operation}: ${detail}`,
    ErrorCodes.GITHUB_RESPONSE_INVALID,
    { operation }
  );
}
