/**
 * CLI Error Handling
 *
 * Every command ends in handleCliError on failure: the error goes to stderr
 * (as JSON under --format json) and the process exits with the mapped status.
 */

import { mapError, type MappedError } from '../../utils/error-mapper.js';
import type { OutputFormat } from './output.js';

function suggestionOf(mapped: MappedError): string | undefined {
  const suggestion = mapped.details?.suggestion;
  return typeof suggestion === 'string' ? suggestion : undefined;
}

export function formatCliError(mapped: MappedError, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(
      {
        error: mapped.message,
        code: mapped.code,
        ...(mapped.details ? { details: mapped.details } : {}),
      },
      null,
      2
    );
  }

  const suggestion = suggestionOf(mapped);
  const lines = [`Error [${mapped.code}]: ${mapped.message}`];
  if (suggestion) lines.push(`Hint: ${suggestion}`);
  return lines.join('\n');
}

export function handleCliError(error: unknown, format: OutputFormat = 'text'): never {
  const mapped = mapError(error);
  console.error(formatCliError(mapped, format));
  process.exit(mapped.exitCode);
}
