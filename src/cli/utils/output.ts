/**
 * CLI Output Formatting
 *
 * Commands build one result object; it is printed either as JSON or through
 * the command's text renderer.
 */

export const OUTPUT_FORMATS = ['text', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Format result based on output mode
 */
export function formatOutput<T>(
  result: T,
  format: OutputFormat = 'text',
  renderText: (result: T) => string = (value) => formatObjectAsKeyValue(value)
): string {
  if (format === 'json') {
    return JSON.stringify(result, null, 2);
  }
  return renderText(result);
}

function formatObjectAsKeyValue(value: unknown): string {
  if (!value || typeof value !== 'object') {
    return String(value);
  }

  const lines: string[] = [];
  for (const [key, entry] of Object.entries(value)) {
    if (entry === undefined) continue;
    const formatted =
      typeof entry === 'object' && entry !== null ? JSON.stringify(entry, null, 2) : String(entry);
    lines.push(`${key}: ${formatted}`);
  }
  return lines.join('\n');
}

/**
 * Print a result to stdout, skipping empty text output
 */
export function printOutput<T>(
  result: T,
  format: OutputFormat = 'text',
  renderText?: (result: T) => string
): void {
  const text = formatOutput(result, format, renderText);
  if (text) {
    console.log(text);
  }
}
