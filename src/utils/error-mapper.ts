import { CommanderError } from 'commander';
import { ReposError, ErrorCodes } from '../core/errors.js';

// Loaded by the bin entry's last-resort handler, so nothing here may import the
// configuration (or the logger, which reads it): an invalid configuration must
// still be reported through mapError.

export interface MappedError {
  message: string;
  code: string;
  exitCode: number; // Process exit status hint
  details?: Record<string, unknown>;
}

const USAGE_EXIT_CODE = 2;

/**
 * Map any error to a standardized internal format
 */
export function mapError(error: unknown): MappedError {
  // 1. Known ReposError (CommandError included)
  if (error instanceof ReposError) {
    return {
      message: error.message,
      code: error.code,
      exitCode: getExitCodeForErrorCode(error.code),
      details: error.context,
    };
  }

  // 2. Command-line parsing errors (unknown option, invalid --jobs value)
  if (error instanceof CommanderError) {
    return {
      message: error.message.replace(/^error: /, ''),
      code: ErrorCodes.INVALID_PARAMETER,
      exitCode: USAGE_EXIT_CODE,
    };
  }

  // 3. Standard errors
  if (error instanceof Error) {
    const message = error.message;

    if (message.includes('Validation error') || message.includes('is required')) {
      return { message, code: ErrorCodes.INVALID_PARAMETER, exitCode: USAGE_EXIT_CODE };
    }

    return {
      message,
      code: ErrorCodes.INTERNAL_ERROR,
      exitCode: 1,
    };
  }

  // 4. Fallback
  return {
    message: String(error),
    code: ErrorCodes.UNKNOWN_ERROR,
    exitCode: 1,
  };
}

function getExitCodeForErrorCode(code: string): number {
  switch (code) {
    case ErrorCodes.INVALID_PARAMETER:
    case ErrorCodes.INVALID_CONFIG:
    case ErrorCodes.GROUP_NOT_FOUND:
      return USAGE_EXIT_CODE;

    case ErrorCodes.COMMAND_NOT_FOUND:
      return 127;

    default:
      return 1;
  }
}
