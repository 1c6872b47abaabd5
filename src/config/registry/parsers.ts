/**
 * Config Parser Functions
 *
 * Type-safe parsers for environment variable values.
 * These handle string-to-type conversion with defaults.
 */

/**
 * Parse a string env var as boolean.
 * Accepts '1', 'true' (case-insensitive) as true.
 */
export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') return defaultValue;
  return value === '1' || value.toLowerCase() === 'true';
}

/**
 * Parse a string env var as floating point number.
 */
export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseFloat(value);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a string env var as integer.
 */
export function parseInt_(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a string env var with validation against allowed values.
 * Unknown values fall back to the default.
 */
export function parseString(
  value: string | undefined,
  defaultValue: string,
  allowedValues?: readonly string[]
): string {
  if (value === undefined || value === '') return defaultValue;
  if (!allowedValues) return value;
  const lower = value.toLowerCase();
  return allowedValues.includes(lower) ? lower : defaultValue;
}

/**
 * Expand tilde (~) to home directory in file paths.
 * Supports both Unix-style HOME and Windows-style USERPROFILE.
 */
export function expandTilde(filePath: string): string {
  if (filePath.startsWith('~/') || filePath === '~') {
    const home = process.env.HOME || process.env.USERPROFILE || '';
    return filePath.replace(/^~/, home);
  }
  return filePath;
}
