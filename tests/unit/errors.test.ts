import { describe, it, expect } from 'vitest';
import {
  ReposError,
  CommandError,
  ErrorCodes,
  createValidationError,
  createConfigNotFoundError,
  createGroupNotFoundError,
  createNoGroupsError,
  createCommandNotFoundError,
  createGitHubAuthError,
  createGitHubResponseError,
} from '../../src/core/errors.js';

describe('ReposError', () => {
  it('should carry code and context and serialise them', () => {
    const error = new ReposError('boom', ErrorCodes.INTERNAL_ERROR, { path: '/tmp' });
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ReposError');
    expect(error.toJSON()).toEqual({ error: 'boom', code: 'E5001', context: { path: '/tmp' } });
  });
});

describe('CommandError', () => {
  it('should record the command and exit code in the context', () => {
    const error = new CommandError('git failed', 'git', 128);
    expect(error).toBeInstanceOf(ReposError);
    expect(error.code).toBe(ErrorCodes.COMMAND_FAILED);
    expect(error.context).toEqual({ command: 'git', exitCode: 128 });
  });
});

describe('error factories', () => {
  it('createValidationError should format field, message and suggestion', () => {
    expect(createValidationError('jobs', 'must be positive', 'use 5').message).toBe(
      'Validation error: jobs - must be positive. Suggestion: use 5'
    );
    expect(createValidationError('jobs', 'must be positive').message).toBe('Validation error: jobs - must be positive');
  });

  it('createConfigNotFoundError should point at the example document', () => {
    const error = createConfigNotFoundError('/x/REPO-GROUPS.md');
    expect(error.message).toBe('Group document not found: /x/REPO-GROUPS.md');
    expect(error.code).toBe(ErrorCodes.CONFIG_NOT_FOUND);
    expect(error.context?.suggestion).toBe('Create it from REPO-GROUPS.md.example or pass --config <file>');
  });

  it('createGroupNotFoundError should list the available groups', () => {
    const error = createGroupNotFoundError('web', ['Tools', 'Backend']);
    expect(error.code).toBe(ErrorCodes.GROUP_NOT_FOUND);
    expect(error.context?.available).toEqual(['Tools', 'Backend']);
  });

  it('createNoGroupsError should use NO_GROUPS', () => {
    expect(createNoGroupsError('doc.md').code).toBe(ErrorCodes.NO_GROUPS);
  });

  it('createCommandNotFoundError should be a CommandError without exit code', () => {
    const error = createCommandNotFoundError('gh');
    expect(error).toBeInstanceOf(CommandError);
    expect(error.message).toBe('Command not found: gh');
    expect(error.exitCode).toBeNull();
    expect(error.code).toBe(ErrorCodes.COMMAND_NOT_FOUND);
  });

  it('createGitHubAuthError should include the detail when given', () => {
    expect(createGitHubAuthError().message).toBe('Unable to list repositories');
    expect(createGitHubAuthError('not logged in').message).toBe('Unable to list repositories: not logged in');
    expect(createGitHubAuthError().code).toBe(ErrorCodes.GITHUB_AUTH_REQUIRED);
  });

  it('createGitHubResponseError should name the operation', () => {
    expect(createGitHubResponseError('repo list', 'bad json').message).toBe(
      'Unexpected GitHub CLI output for repo list: bad json'
    );
  });
});
