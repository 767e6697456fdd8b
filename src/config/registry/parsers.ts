/**
 * Config Parser Functions
 *
 * Parsers for environment variable values. They convert the raw string
 * and leave range checking to the option's zod schema.
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
 * Unparseable input comes back as NaN so validation reports it.
 */
export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  return Number(value.trim());
}

/**
 * Parse a string env var as integer.
 */
export function parseInt_(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const trimmed = value.trim();
  return /^-?\d+$/.test(trimmed) ? parseInt(trimmed, 10) : Number.NaN;
}

/**
 * Parse a string env var. Enum membership is checked by the schema.
 */
export function parseString(value: string | undefined, defaultValue: string): string {
  if (value === undefined || value === '') return defaultValue;
  return value.trim();
}

/**
 * Parse a comma separated env var. Empty entries are dropped.
 */
export function parseStringArray(value: string | undefined, defaultValue: string[]): string[] {
  if (value === undefined) return defaultValue;
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
