/**
 * Registry-driven option reading
 *
 * Reads each option from the environment with its parser, validates it
 * with its zod schema and collects every failure so a bad configuration
 * is reported in one ConfigurationError instead of one field at a time.
 */

import type { z } from 'zod';
import type { ConfigRegistry, ParserType, EnvSource } from './types.js';
import { parseBoolean, parseNumber, parseInt_, parseString, parseStringArray } from './parsers.js';

/**
 * The subset of option metadata needed to read a value
 */
export interface ReadableOption<T> {
  envKey: string;
  defaultValue: unknown;
  schema: z.ZodType<T>;
  parse?: ParserType;
}

export type OptionReader = <T>(path: string, option: ReadableOption<T>) => T;

// =============================================================================
// PARSING
// =============================================================================

/**
 * Infer parser type from the default value when not explicitly specified
 */
function inferParser(defaultValue: unknown): ParserType {
  if (typeof defaultValue === 'boolean') return 'boolean';
  if (typeof defaultValue === 'number') return 'number';
  if (Array.isArray(defaultValue)) return 'stringArray';
  return 'string';
}

/**
 * Parse an environment variable value. The result is unvalidated.
 */
function parseEnvValue(option: ReadableOption<unknown>, envValue: string | undefined): unknown {
  const defaultValue = option.defaultValue;
  if (envValue === undefined || envValue === '') {
    return defaultValue;
  }

  const parserType = option.parse ?? inferParser(defaultValue);
  switch (parserType) {
    case 'boolean':
      return parseBoolean(envValue, false);
    case 'number':
      return parseNumber(envValue, Number.NaN);
    case 'int':
      return parseInt_(envValue, Number.NaN);
    case 'stringArray':
      return parseStringArray(envValue, []);
    case 'string':
      return parseString(envValue, '');
  }
}

/**
 * Format Zod validation issues into human-readable messages
 */
function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ');
}

/**
 * Create a reader bound to an env source. Validation failures are appended
 * to `issues` and the option's default is used in their place so building
 * can continue and report everything at once.
 */
export function createOptionReader(env: EnvSource, issues: string[]): OptionReader {
  return <T>(path: string, option: ReadableOption<T>): T => {
    const raw = parseEnvValue(option, option.envKey ? env[option.envKey] : undefined);
    const result = option.schema.safeParse(raw);
    if (result.success) {
      return result.data;
    }

    issues.push(`${path} (${option.envKey}=${JSON.stringify(raw)}): ${formatIssues(result.error)}`);

    const fallback = option.schema.safeParse(option.defaultValue);
    if (fallback.success) {
      return fallback.data;
    }
    // Default values are validated by their own schema in tests; reaching
    // this point means the registry itself is wrong.
    throw new TypeError(`Registry default for ${path} does not satisfy its schema`);
  };
}

// =============================================================================
// DOCUMENTATION HELPERS
// =============================================================================

/**
 * Get all environment variables from the registry
 */
export function getAllEnvVars(registry: ConfigRegistry): Array<{
  envKey: string;
  description: string;
  defaultValue: unknown;
  sensitive: boolean;
  section: string;
}> {
  const envVars: Array<{
    envKey: string;
    description: string;
    defaultValue: unknown;
    sensitive: boolean;
    section: string;
  }> = [];

  for (const [sectionKey, section] of Object.entries(registry.sections)) {
    for (const option of Object.values(section.options)) {
      envVars.push({
        envKey: option.envKey,
        description: option.description,
        defaultValue: option.sensitive ? undefined : option.defaultValue,
        sensitive: option.sensitive ?? false,
        section: sectionKey,
      });
    }
  }

  return envVars;
}

/**
 * Dotted paths of every option flagged reloadable
 */
export function getReloadablePaths(registry: ConfigRegistry): string[] {
  const paths: string[] = [];
  for (const [sectionKey, section] of Object.entries(registry.sections)) {
    for (const [optionKey, option] of Object.entries(section.options)) {
      if (option.reloadable) {
        paths.push(`${sectionKey}.${optionKey}`);
      }
    }
  }
  return paths;
}
