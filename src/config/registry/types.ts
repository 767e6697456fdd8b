/**
 * Config Registry Type Definitions
 *
 * Provides metadata-driven configuration with Zod validation.
 * Each config option declares envKey, default, description, schema, and parser.
 */

import type { z } from 'zod';

// =============================================================================
// PARSER TYPES
// =============================================================================

/**
 * Built-in parser types for env var conversions
 */
export type ParserType =
  | 'string' // Direct string value
  | 'boolean' // '1', 'true' -> true
  | 'number' // parseFloat
  | 'int' // parseInt
  | 'stringArray'; // CSV parsing

// =============================================================================
// CONFIG OPTION TYPES
// =============================================================================

/**
 * Metadata for a single configuration option
 */
export interface ConfigOptionMeta<T = unknown> {
  /** Environment variable key (e.g., 'HYBRID_CHUNKER_TARGET_WORDS') */
  envKey: string;

  /** Default value when env var is not set */
  defaultValue: T;

  /** Description for documentation */
  description: string;

  /** Zod schema for validation */
  schema: z.ZodType<T>;

  /** Parser type; inferred from the default value when omitted */
  parse?: ParserType;

  /** Whether this is a sensitive value (keys) - hidden in docs */
  sensitive?: boolean;

  /** Whether a running pipeline picks up a reloaded value */
  reloadable?: boolean;
}

// =============================================================================
// CONFIG SECTION TYPES
// =============================================================================

/**
 * Metadata for a configuration section (group of related options)
 */
export interface ConfigSectionMeta {
  /** Section name (e.g., 'chunking', 'rateLimit') */
  name: string;

  /** Section description for documentation */
  description: string;

  /** Options in this section, keyed by config property name */
  options: Record<string, ConfigOptionMeta>;
}

/**
 * Complete registry of all configuration sections
 */
export interface ConfigRegistry {
  sections: Record<string, ConfigSectionMeta>;
}

/**
 * Source of raw environment values
 */
export type EnvSource = Record<string, string | undefined>;
