/**
 * Config Registry
 *
 * Assembles all configuration sections into a complete registry.
 * This is the single source of truth for config metadata.
 */

import type { ConfigRegistry } from './types.js';

import { chunkingSection } from './sections/chunking.js';
import { routerSection } from './sections/router.js';
import { rateLimitSection } from './sections/rateLimit.js';
import { circuitBreakerSection } from './sections/circuitBreaker.js';
import { llmSection } from './sections/llm.js';
import { batchSection } from './sections/batch.js';
import { storageSection } from './sections/storage.js';
import { loggingSection } from './sections/logging.js';
import { runtimeSection } from './sections/runtime.js';

/**
 * The complete config registry with all sections.
 */
export const configRegistry: ConfigRegistry = {
  sections: {
    chunking: chunkingSection,
    router: routerSection,
    rateLimit: rateLimitSection,
    circuitBreaker: circuitBreakerSection,
    llm: llmSection,
    batch: batchSection,
    storage: storageSection,
    logging: loggingSection,
    runtime: runtimeSection,
  },
};

// Typed option groups, read field by field by the config builder
export { chunkingOptions } from './sections/chunking.js';
export { routerOptions } from './sections/router.js';
export { rateLimitOptions } from './sections/rateLimit.js';
export { circuitBreakerOptions } from './sections/circuitBreaker.js';
export { llmOptions } from './sections/llm.js';
export { batchOptions } from './sections/batch.js';
export { storageOptions } from './sections/storage.js';
export { loggingOptions } from './sections/logging.js';
export { runtimeOptions } from './sections/runtime.js';

export type { ConfigRegistry, ConfigSectionMeta, ConfigOptionMeta, EnvSource } from './types.js';
export { createOptionReader, getAllEnvVars, getReloadablePaths } from './schema-builder.js';
export type { OptionReader } from './schema-builder.js';
