/**
 * Centralized configuration module
 *
 * Configuration is built from the registry at src/config/registry/.
 * Each option declares envKey, default, description, schema, and parser.
 *
 * To add a new config option:
 *   1. Find or create the section in src/config/registry/sections/
 *   2. Add the option with envKey, defaultValue, description, schema, parse
 *   3. Add the field to the Config interface and its section builder below
 *
 * Usage:
 *   import { buildConfig } from './config/index.js';
 *   const config = buildConfig();
 *   console.log(config.chunking.targetWords);
 */

import { z } from 'zod';
import {
  chunkingOptions,
  routerOptions,
  rateLimitOptions,
  circuitBreakerOptions,
  llmOptions,
  batchOptions,
  storageOptions,
  loggingOptions,
  runtimeOptions,
  createOptionReader,
  type EnvSource,
  type OptionReader,
} from './registry/index.js';
import { ConfigurationError } from '../core/errors.js';
import { loadEnv } from './env.js';

// =============================================================================
// CONFIGURATION INTERFACE
// =============================================================================

export type LlmProviderName = 'openai' | 'anthropic' | 'disabled';
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface ChunkingConfig {
  targetWords: number;
  minWords: number;
  maxWords: number;
  overlapWords: number;
  minChars: number;
  maxArticleChars: number;
}

export interface RouterConfig {
  confidenceMin: number;
  boundaryWeight: number;
  sizeWeight: number;
  complexityWeight: number;
  routingEnabled: boolean;
  llmAllowDomains: string[];
  llmDenyDomains: string[];
}

export interface RateLimitConfig {
  maxLlmCallsPerMin: number;
  maxLlmCallsPerDomain: number;
  maxLlmCallsPerBatch: number;
  maxLlmPercentagePerBatch: number;
  dailyCostLimitUsd: number;
  costPerTokenInput: number;
  costPerTokenOutput: number;
  promptOverheadTokens: number;
  costTimezone: string;
}

export interface CircuitBreakerSettings {
  failureThreshold: number;
  resetTimeoutMs: number;
}

export interface LlmConfig {
  provider: LlmProviderName;
  apiKey: string;
  model: string;
  baseUrl: string;
  temperature: number;
  maxOutputTokens: number;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  retryJitter: number;
  maxOffset: number;
  refinementEnabled: boolean;
}

export interface BatchConfig {
  batchSize: number;
  maxConcurrentBatches: number;
  maxConcurrentJobs: number;
  maxInFlightArticles: number;
  backpressureThreshold: number;
  retryFailedArticles: boolean;
  maxRetries: number;
  adaptiveBatchSizing: boolean;
}

export interface Config {
  chunking: ChunkingConfig;
  router: RouterConfig;
  rateLimit: RateLimitConfig;
  circuitBreaker: CircuitBreakerSettings;
  llm: LlmConfig;
  batch: BatchConfig;
  storage: {
    sqlitePath: string;
    busyTimeoutMs: number;
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
  runtime: {
    nodeEnv: string;
  };
}

/**
 * Partial overrides, one level deep per section
 */
export type ConfigOverrides = {
  [K in keyof Config]?: Partial<Config[K]>;
};

// =============================================================================
// SECTION BUILDERS
// =============================================================================

function buildChunking(read: OptionReader): ChunkingConfig {
  const o = chunkingOptions;
  return {
    targetWords: read('chunking.targetWords', o.targetWords),
    minWords: read('chunking.minWords', o.minWords),
    maxWords: read('chunking.maxWords', o.maxWords),
    overlapWords: read('chunking.overlapWords', o.overlapWords),
    minChars: read('chunking.minChars', o.minChars),
    maxArticleChars: read('chunking.maxArticleChars', o.maxArticleChars),
  };
}

function buildRouter(read: OptionReader): RouterConfig {
  const o = routerOptions;
  return {
    confidenceMin: read('router.confidenceMin', o.confidenceMin),
    boundaryWeight: read('router.boundaryWeight', o.boundaryWeight),
    sizeWeight: read('router.sizeWeight', o.sizeWeight),
    complexityWeight: read('router.complexityWeight', o.complexityWeight),
    routingEnabled: read('router.routingEnabled', o.routingEnabled),
    llmAllowDomains: read('router.llmAllowDomains', o.llmAllowDomains),
    llmDenyDomains: read('router.llmDenyDomains', o.llmDenyDomains),
  };
}

function buildRateLimit(read: OptionReader): RateLimitConfig {
  const o = rateLimitOptions;
  return {
    maxLlmCallsPerMin: read('rateLimit.maxLlmCallsPerMin', o.maxLlmCallsPerMin),
    maxLlmCallsPerDomain: read('rateLimit.maxLlmCallsPerDomain', o.maxLlmCallsPerDomain),
    maxLlmCallsPerBatch: read('rateLimit.maxLlmCallsPerBatch', o.maxLlmCallsPerBatch),
    maxLlmPercentagePerBatch: read('rateLimit.maxLlmPercentagePerBatch', o.maxLlmPercentagePerBatch),
    dailyCostLimitUsd: read('rateLimit.dailyCostLimitUsd', o.dailyCostLimitUsd),
    costPerTokenInput: read('rateLimit.costPerTokenInput', o.costPerTokenInput),
    costPerTokenOutput: read('rateLimit.costPerTokenOutput', o.costPerTokenOutput),
    promptOverheadTokens: read('rateLimit.promptOverheadTokens', o.promptOverheadTokens),
    costTimezone: read('rateLimit.costTimezone', o.costTimezone),
  };
}

function buildCircuitBreaker(read: OptionReader): CircuitBreakerSettings {
  const o = circuitBreakerOptions;
  return {
    failureThreshold: read('circuitBreaker.failureThreshold', o.failureThreshold),
    resetTimeoutMs: read('circuitBreaker.resetTimeoutMs', o.resetTimeoutMs),
  };
}

function buildLlm(read: OptionReader): LlmConfig {
  const o = llmOptions;
  return {
    provider: read('llm.provider', o.provider),
    apiKey: read('llm.apiKey', o.apiKey),
    model: read('llm.model', o.model),
    baseUrl: read('llm.baseUrl', o.baseUrl),
    temperature: read('llm.temperature', o.temperature),
    maxOutputTokens: read('llm.maxOutputTokens', o.maxOutputTokens),
    requestTimeoutMs: read('llm.requestTimeoutMs', o.requestTimeoutMs),
    maxRetries: read('llm.maxRetries', o.maxRetries),
    retryBaseDelayMs: read('llm.retryBaseDelayMs', o.retryBaseDelayMs),
    retryMaxDelayMs: read('llm.retryMaxDelayMs', o.retryMaxDelayMs),
    retryJitter: read('llm.retryJitter', o.retryJitter),
    maxOffset: read('llm.maxOffset', o.maxOffset),
    refinementEnabled: read('llm.refinementEnabled', o.refinementEnabled),
  };
}

function buildBatch(read: OptionReader): BatchConfig {
  const o = batchOptions;
  return {
    batchSize: read('batch.batchSize', o.batchSize),
    maxConcurrentBatches: read('batch.maxConcurrentBatches', o.maxConcurrentBatches),
    maxConcurrentJobs: read('batch.maxConcurrentJobs', o.maxConcurrentJobs),
    maxInFlightArticles: read('batch.maxInFlightArticles', o.maxInFlightArticles),
    backpressureThreshold: read('batch.backpressureThreshold', o.backpressureThreshold),
    retryFailedArticles: read('batch.retryFailedArticles', o.retryFailedArticles),
    maxRetries: read('batch.maxRetries', o.maxRetries),
    adaptiveBatchSizing: read('batch.adaptiveBatchSizing', o.adaptiveBatchSizing),
  };
}

// =============================================================================
// SCHEMA VALIDATION
// =============================================================================

type OptionGroup = Record<string, { schema: z.ZodTypeAny }>;

function sectionIssues(section: string, options: OptionGroup, values: unknown): string[] {
  const shape = Object.fromEntries(Object.entries(options).map(([key, option]) => [key, option.schema]));
  const result = z.object(shape).safeParse(values);
  if (result.success) return [];
  return result.error.issues.map((issue) => `${section}.${issue.path.join('.')}: ${issue.message}`);
}

/**
 * Check every value against its registry schema. Values read from the
 * environment already pass; this catches overrides set in code.
 */
export function checkConfigSchemas(config: Config): string[] {
  return [
    ...sectionIssues('chunking', chunkingOptions, config.chunking),
    ...sectionIssues('router', routerOptions, config.router),
    ...sectionIssues('rateLimit', rateLimitOptions, config.rateLimit),
    ...sectionIssues('circuitBreaker', circuitBreakerOptions, config.circuitBreaker),
    ...sectionIssues('llm', llmOptions, config.llm),
    ...sectionIssues('batch', batchOptions, config.batch),
    ...sectionIssues('storage', storageOptions, config.storage),
    ...sectionIssues('logging', loggingOptions, config.logging),
    ...sectionIssues('runtime', runtimeOptions, config.runtime),
  ];
}

// =============================================================================
// CROSS-FIELD VALIDATION
// =============================================================================

const WEIGHT_SUM_TOLERANCE = 1e-6;

/**
 * Rules that span several options. Returns one message per violation.
 */
export function checkConfigRules(config: Config): string[] {
  const issues: string[] = [];
  const { chunking, router, rateLimit, batch, llm } = config;

  const weightSum = router.boundaryWeight + router.sizeWeight + router.complexityWeight;
  if (Math.abs(weightSum - 1) > WEIGHT_SUM_TOLERANCE) {
    issues.push(`router weights must sum to 1.0 (got ${weightSum})`);
  }
  for (const [name, value] of [
    ['boundaryWeight', router.boundaryWeight],
    ['sizeWeight', router.sizeWeight],
    ['complexityWeight', router.complexityWeight],
  ] as const) {
    if (value < 0 || value > 1) {
      issues.push(`router.${name} must lie in [0, 1] (got ${value})`);
    }
  }
  if (router.confidenceMin < 0 || router.confidenceMin > 1) {
    issues.push(`router.confidenceMin must lie in [0, 1] (got ${router.confidenceMin})`);
  }

  if (!(chunking.minWords > 0 && chunking.minWords < chunking.targetWords)) {
    issues.push(
      `chunking.minWords must be > 0 and < targetWords (got ${chunking.minWords} / ${chunking.targetWords})`
    );
  }
  if (!(chunking.targetWords < chunking.maxWords)) {
    issues.push(
      `chunking.targetWords must be < maxWords (got ${chunking.targetWords} / ${chunking.maxWords})`
    );
  }
  if (chunking.overlapWords < 0 || chunking.overlapWords >= chunking.minWords) {
    issues.push(
      `chunking.overlapWords must be >= 0 and < minWords (got ${chunking.overlapWords} / ${chunking.minWords})`
    );
  }

  if (rateLimit.maxLlmPercentagePerBatch < 0 || rateLimit.maxLlmPercentagePerBatch > 1) {
    issues.push(
      `rateLimit.maxLlmPercentagePerBatch must lie in [0, 1] (got ${rateLimit.maxLlmPercentagePerBatch})`
    );
  }
  if (!isValidTimezone(rateLimit.costTimezone)) {
    issues.push(`rateLimit.costTimezone is not a known timezone (got ${rateLimit.costTimezone})`);
  }

  if (!(batch.backpressureThreshold > 0 && batch.backpressureThreshold <= 1)) {
    issues.push(
      `batch.backpressureThreshold must lie in (0, 1] (got ${batch.backpressureThreshold})`
    );
  }

  if (llm.retryBaseDelayMs > llm.retryMaxDelayMs) {
    issues.push(
      `llm.retryBaseDelayMs must not exceed retryMaxDelayMs (got ${llm.retryBaseDelayMs} / ${llm.retryMaxDelayMs})`
    );
  }
  if (llm.provider !== 'disabled' && llm.apiKey === '') {
    issues.push(`llm.apiKey is required when llm.provider is ${llm.provider}`);
  }

  return issues;
}

function isValidTimezone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

// =============================================================================
// BUILD CONFIGURATION
// =============================================================================

/**
 * Build and validate configuration from an environment source.
 * Throws ConfigurationError listing every invalid option.
 */
export function buildConfig(env: EnvSource = process.env, overrides: ConfigOverrides = {}): Config {
  const issues: string[] = [];
  const read = createOptionReader(env, issues);

  const base: Config = {
    chunking: buildChunking(read),
    router: buildRouter(read),
    rateLimit: buildRateLimit(read),
    circuitBreaker: buildCircuitBreaker(read),
    llm: buildLlm(read),
    batch: buildBatch(read),
    storage: {
      sqlitePath: read('storage.sqlitePath', storageOptions.sqlitePath),
      busyTimeoutMs: read('storage.busyTimeoutMs', storageOptions.busyTimeoutMs),
    },
    logging: {
      level: read('logging.level', loggingOptions.level),
      pretty: read('logging.pretty', loggingOptions.pretty),
    },
    runtime: {
      nodeEnv: read('runtime.nodeEnv', runtimeOptions.nodeEnv),
    },
  };

  const config = applyOverrides(base, overrides);
  issues.push(...checkConfigSchemas(config), ...checkConfigRules(config));

  if (issues.length > 0) {
    throw new ConfigurationError(
      `Configuration validation failed:\n${issues.map((e) => `  - ${e}`).join('\n')}`,
      issues
    );
  }

  return config;
}

/**
 * Merge section overrides over a config. The result is unchecked until it
 * goes through buildConfig or validateConfig.
 */
export function applyOverrides(config: Config, overrides: ConfigOverrides): Config {
  return {
    chunking: { ...config.chunking, ...overrides.chunking },
    router: { ...config.router, ...overrides.router },
    rateLimit: { ...config.rateLimit, ...overrides.rateLimit },
    circuitBreaker: { ...config.circuitBreaker, ...overrides.circuitBreaker },
    llm: { ...config.llm, ...overrides.llm },
    batch: { ...config.batch, ...overrides.batch },
    storage: { ...config.storage, ...overrides.storage },
    logging: { ...config.logging, ...overrides.logging },
    runtime: { ...config.runtime, ...overrides.runtime },
  };
}

/**
 * Validate a config assembled in code. Throws ConfigurationError.
 */
export function validateConfig(config: Config): Config {
  const issues = [...checkConfigSchemas(config), ...checkConfigRules(config)];
  if (issues.length > 0) {
    throw new ConfigurationError(
      `Configuration validation failed:\n${issues.map((e) => `  - ${e}`).join('\n')}`,
      issues
    );
  }
  return config;
}

/**
 * Defaults only, ignoring the environment. Useful for tests and embedding.
 */
export function defaultConfig(overrides: ConfigOverrides = {}): Config {
  return buildConfig({}, overrides);
}

let processConfig: Config | null = null;

/**
 * Lazily built process-wide configuration read from process.env.
 * Components never read it implicitly; callers pass sections in.
 */
export function getConfig(): Config {
  if (!processConfig) {
    loadEnv();
    processConfig = buildConfig(process.env);
  }
  return processConfig;
}

/**
 * Drop the cached process configuration so the next getConfig() rebuilds it.
 */
export function resetConfig(): void {
  processConfig = null;
}

// Re-export registry for documentation generation
export { configRegistry, getAllEnvVars, getReloadablePaths } from './registry/index.js';
export { loadEnv };
