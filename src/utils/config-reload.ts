/**
 * Configuration Hot Reload Utility
 *
 * Holds the active configuration as an immutable, versioned snapshot.
 * A reload builds and validates a complete new Config, merges only the
 * reloadable options into it and swaps the snapshot in one assignment;
 * readers never observe a half-applied change. An invalid configuration
 * leaves the current snapshot in place.
 *
 * Note: batch sizing, storage and provider credentials need a restart.
 * Those differences are reported in `restartRequired` and not applied.
 *
 * Usage:
 *   const reloader = new ConfigReloader(buildConfig());
 *   reloader.onReload((result, snapshot) => router.updateConfig(snapshot.config.router));
 *   reloader.reload(process.env);
 */

import { createComponentLogger } from './logger.js';
import { systemClock } from './clock.js';
import {
  buildConfig,
  configRegistry,
  getReloadablePaths,
  type Config,
  type ConfigOverrides,
} from '../config/index.js';
import type { EnvSource } from '../config/registry/index.js';
import type { Clock } from '../core/interfaces/clock.js';

const logger = createComponentLogger('config-reload');

// =============================================================================
// TYPES
// =============================================================================

export interface ConfigSnapshot {
  readonly version: number;
  readonly loadedAt: number;
  readonly config: Config;
}

export interface ConfigChange {
  path: string;
  oldValue: unknown;
  newValue: unknown;
}

export interface ReloadResult {
  success: boolean;
  version: number;
  changes: ConfigChange[];
  restartRequired: ConfigChange[];
  errors: string[];
  timestamp: number;
}

export type ReloadCallback = (result: ReloadResult, snapshot: ConfigSnapshot) => void;

// =============================================================================
// RELOADABLE OPTIONS
// =============================================================================

const RELOADABLE_PATHS = getReloadablePaths(configRegistry);

const ALL_PATHS = Object.entries(configRegistry.sections).flatMap(([sectionKey, section]) =>
  Object.keys(section.options).map((optionKey) => `${sectionKey}.${optionKey}`)
);

/**
 * Copy the reloadable options of `next` over `current`.
 * Must agree with the `reloadable` flags in the registry sections.
 */
function mergeReloadable(current: Config, next: Config): Config {
  return {
    ...current,
    router: { ...next.router },
    rateLimit: { ...next.rateLimit, costTimezone: current.rateLimit.costTimezone },
    circuitBreaker: { ...next.circuitBreaker },
    llm: {
      ...current.llm,
      maxOffset: next.llm.maxOffset,
      refinementEnabled: next.llm.refinementEnabled,
    },
  };
}

function freezeConfig(config: Config): Config {
  for (const section of Object.values(config)) {
    for (const value of Object.values(section)) {
      if (Array.isArray(value)) Object.freeze(value);
    }
    Object.freeze(section);
  }
  return Object.freeze(config);
}

// =============================================================================
// CONFIG RELOADER CLASS
// =============================================================================

/**
 * Versioned configuration holder
 */
export class ConfigReloader {
  private snapshot: ConfigSnapshot;
  private callbacks: ReloadCallback[] = [];
  private readonly clock: Clock;

  constructor(initial: Config, clock: Clock = systemClock) {
    this.clock = clock;
    this.snapshot = Object.freeze({
      version: 1,
      loadedAt: clock.now(),
      config: freezeConfig(structuredClone(initial)),
    });
  }

  /**
   * The active snapshot. Hold on to the returned object for a consistent view.
   */
  current(): ConfigSnapshot {
    return this.snapshot;
  }

  /**
   * Rebuild configuration from an env source (plus code overrides) and
   * swap in the reloadable part
   */
  reload(env: EnvSource = process.env, overrides: ConfigOverrides = {}): ReloadResult {
    const timestamp = this.clock.now();

    let next: Config;
    try {
      next = buildConfig(env, overrides);
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      logger.error({ error: errorMsg, version: this.snapshot.version }, 'Configuration reload failed');
      const result: ReloadResult = {
        success: false,
        version: this.snapshot.version,
        changes: [],
        restartRequired: [],
        errors: [errorMsg],
        timestamp,
      };
      this.notifyCallbacks(result);
      return result;
    }

    const previous = this.snapshot.config;
    const changes = this.diff(previous, next, RELOADABLE_PATHS);
    const restartRequired = this.diff(
      previous,
      next,
      ALL_PATHS.filter((path) => !RELOADABLE_PATHS.includes(path))
    );

    if (changes.length > 0) {
      this.snapshot = Object.freeze({
        version: this.snapshot.version + 1,
        loadedAt: timestamp,
        config: freezeConfig(mergeReloadable(structuredClone(previous), structuredClone(next))),
      });
      logger.info(
        { version: this.snapshot.version, changes: changes.map((c) => c.path) },
        'Configuration reloaded'
      );
    } else {
      logger.debug('Configuration reload: no changes detected');
    }

    if (restartRequired.length > 0) {
      logger.warn(
        { paths: restartRequired.map((c) => c.path) },
        'Configuration changes ignored until restart'
      );
    }

    const result: ReloadResult = {
      success: true,
      version: this.snapshot.version,
      changes,
      restartRequired,
      errors: [],
      timestamp,
    };
    this.notifyCallbacks(result);
    return result;
  }

  /**
   * Register a reload callback
   */
  onReload(callback: ReloadCallback): () => void {
    this.callbacks.push(callback);
    return () => {
      const index = this.callbacks.indexOf(callback);
      if (index >= 0) {
        this.callbacks.splice(index, 1);
      }
    };
  }

  /**
   * Get list of reloadable config paths
   */
  getReloadablePaths(): string[] {
    return [...RELOADABLE_PATHS];
  }

  private diff(a: Config, b: Config, paths: string[]): ConfigChange[] {
    const changes: ConfigChange[] = [];
    for (const path of paths) {
      const oldValue = getValueByPath(a, path);
      const newValue = getValueByPath(b, path);
      if (JSON.stringify(oldValue) !== JSON.stringify(newValue)) {
        changes.push({ path, oldValue, newValue });
      }
    }
    return changes;
  }

  /**
   * Notify all registered callbacks. A failing callback is logged and
   * recorded in the result; the swap has already happened.
   */
  private notifyCallbacks(result: ReloadResult): void {
    for (const callback of this.callbacks) {
      try {
        callback(result, this.snapshot);
      } catch (error) {
        const errorMsg = error instanceof Error ? error.message : String(error);
        logger.error({ error: errorMsg }, 'Reload callback failed');
        result.errors.push(`Callback failed: ${errorMsg}`);
      }
    }
  }
}

/**
 * Get a nested value by dot-separated path
 */
function getValueByPath(obj: unknown, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (typeof current !== 'object' || current === null || !(part in current)) {
      return undefined;
    }
    current = Reflect.get(current, part);
  }
  return current;
}
