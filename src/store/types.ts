import type { Logger } from '../util/logger.js';

/**
 * Capability contract for token storage. `get` returns '' when the id is
 * unknown; use `TimedStore.lookup` where a stored empty value must be told
 * apart from a miss.
 */
export interface Store {
  set(id: string, value: string): void;
  get(id: string, clear: boolean): string;
}

export type StoreOptions = {
  collectThreshold: number; // live insertions that trigger a background sweep
  ttlMs: number;
  clock?: () => number; // epoch ms, defaults to Date.now
  logger?: Logger;
};

export type Entry = { value: string; insertedAt: number };

export type QueueNode = { id: string; insertedAt: number };

export type LookupResult = { found: true; value: string } | { found: false };

export type StoreStats = {
  entries: number;
  queued: number;
  liveCount: number;
};
