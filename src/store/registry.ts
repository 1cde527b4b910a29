import dotenv from 'dotenv';
import { DEFAULT_COLLECT_THRESHOLD, loadConfig } from '../env.js';
import { createLogger } from '../util/logger.js';
import { TimedStore } from './memoryStore.js';
import type { Store, StoreOptions } from './types.js';

export const DEFAULT_TTL_MS = 10 * 60 * 1000; // 10 minutes

export function createMemoryStore(opts: Partial<StoreOptions> = {}): TimedStore {
  return new TimedStore({
    collectThreshold: opts.collectThreshold ?? DEFAULT_COLLECT_THRESHOLD,
    ttlMs: opts.ttlMs ?? DEFAULT_TTL_MS,
    clock: opts.clock,
    logger: opts.logger,
  });
}

let current: Store | null = null;

/**
 * The process-wide store. Built from the environment (and a local .env) on
 * first use unless `setCustomStore` installed one before.
 */
export function getStore(): Store {
  if (!current) {
    dotenv.config();
    const cfg = loadConfig();
    current = createMemoryStore({
      collectThreshold: cfg.collectThreshold,
      ttlMs: cfg.ttlMs,
      logger: createLogger(cfg.logLevel),
    });
  }
  return current;
}

export function setCustomStore(store: Store): void {
  current = store;
}

// Drops the current default so the next getStore() rebuilds it.
export function resetStore(): void {
  current = null;
}
