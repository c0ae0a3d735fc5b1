/**
 * Registry Factory: builds a ClaimService over the store named by the configuration.
 */

import type { ClaimStore, EventSink, LogicalClock } from './types.js';
import { loadConfig, type ClaimRegistryConfig } from './config.js';
import { ClaimService } from './claims.js';
import { createLogger, parseLogLevel } from './logger.js';
import type { MetricsCollector } from './metrics.js';
import { MemoryClaimStore } from '../storage/memory.js';
import { SqliteClaimStore } from '../storage/sqlite.js';

export interface ClaimRegistryDeps {
  clock: LogicalClock;
  events: EventSink;
  metrics?: MetricsCollector;
}

export interface ClaimRegistry {
  service: ClaimService;
  store: ClaimStore;
  config: ClaimRegistryConfig;
  /** Release the store's resources (closes the SQLite handle). */
  close(): void;
}

export function createClaimRegistry(config: ClaimRegistryConfig, deps: ClaimRegistryDeps): ClaimRegistry {
  const level = parseLogLevel(config.logLevel);
  if (level === null) {
    throw new Error(`Unknown log level: ${config.logLevel}`);
  }
  // Scoped to this registry's loggers; the process-wide level is left alone.
  const logger = createLogger('ClaimRegistry', level);
  let store: ClaimStore;
  let close: () => void;
  if (config.storage === 'sqlite') {
    const sqlite = new SqliteClaimStore(config.databasePath);
    store = sqlite;
    close = () => sqlite.close();
  } else {
    store = new MemoryClaimStore();
    close = () => {};
  }

  const service = new ClaimService({
    store,
    clock: deps.clock,
    events: deps.events,
    proofLimit: config.proofLimit,
    logger: logger.child('service'),
    metrics: deps.metrics,
  });

  logger.info('Registry ready', { storage: config.storage, proofLimit: config.proofLimit });
  return { service, store, config, close };
}

/** Load configuration from the environment (plus overrides) and build the registry. */
export function loadClaimRegistry(
  deps: ClaimRegistryDeps,
  overrides: Partial<ClaimRegistryConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
): ClaimRegistry {
  const config = loadConfig(overrides, env);
  if (!config.ok) throw new Error(config.error);
  return createClaimRegistry(config.value, deps);
}
