// Main entry point for hybrid-chunker (library usage)
//
// createHybridChunker() wires the whole pipeline; the individual components
// are exported for callers that assemble their own.

export { createHybridChunker } from './core/factory.js';
export type { HybridChunker, HybridChunkerOptions, HybridChunkerStatus } from './core/factory.js';

// Domain types and errors
export * from './core/types.js';
export * from './core/errors.js';
export type { Clock, SleepFn } from './core/interfaces/clock.js';
export type { ArticleQuery, IArticleStorage } from './core/interfaces/storage.js';
export type {
  CompletionParameters,
  CompletionResult,
  CompletionUsage,
  ICompletionProvider,
} from './core/interfaces/completion.js';

// Configuration
export {
  buildConfig,
  defaultConfig,
  getConfig,
  resetConfig,
  validateConfig,
  applyOverrides,
  configRegistry,
  getAllEnvVars,
  getReloadablePaths,
  loadEnv,
} from './config/index.js';
export type {
  Config,
  ConfigOverrides,
  ChunkingConfig,
  RouterConfig,
  RateLimitConfig,
  CircuitBreakerSettings,
  LlmConfig,
  BatchConfig,
} from './config/index.js';
export { ConfigReloader } from './utils/config-reload.js';
export type { ConfigSnapshot, ConfigChange, ReloadResult } from './utils/config-reload.js';

// Pipeline components
export * from './services/chunking/index.js';
export * from './services/routing/index.js';
export * from './services/rate-limit/index.js';
export * from './services/refinement/index.js';
export * from './services/batch/index.js';
export { CircuitBreaker } from './utils/circuit-breaker.js';
export type {
  BreakerAdmission,
  BreakerDenial,
  BreakerPermit,
  CircuitBreakerConfig,
  CircuitBreakerStats,
  CircuitState,
} from './utils/circuit-breaker.js';

// Storage
export { InMemoryArticleStore } from './core/adapters/memory-storage.adapter.js';
export { openDatabase, closeDatabase, initializeSchema } from './db/connection.js';
export type { AppDb, DatabaseDeps } from './db/connection.js';
export { createArticleRepository } from './db/repositories/articles.js';
export type { ArticleRepository } from './db/repositories/articles.js';

export { createComponentLogger } from './utils/logger.js';
