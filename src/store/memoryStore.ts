import { createLogger } from '../util/logger.js';
import type { Logger } from '../util/logger.js';
import type { Entry, LookupResult, QueueNode, Store, StoreOptions, StoreStats } from './types.js';

/**
 * Raised when the eviction queue holds something only a bug could have put
 * there. The sweep stops instead of skipping the rest of the queue quietly.
 */
export class StoreInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StoreInvariantError';
  }
}

function assertQueueNode(node: QueueNode, pos: number): void {
  if (typeof node.id !== 'string' || !Number.isFinite(node.insertedAt)) {
    throw new StoreInvariantError(`malformed eviction queue node at position ${pos}`);
  }
}

/**
 * In-memory store for short-lived tokens.
 *
 * Entries live in `index`; `queue` records every insertion in order so the
 * sweep can find expired ids from the oldest end without scanning the index.
 * Nodes whose id was consumed or overwritten stay in the queue as orphans
 * until the sweep reaches them.
 *
 * Each method runs to completion on the event loop, so the index, the queue
 * and `liveCount` are always observed and changed together.
 */
export class TimedStore implements Store {
  private index = new Map<string, Entry>();
  private queue: QueueNode[] = [];
  // Queue nodes added since they were last swept; decides when to schedule a sweep.
  private liveCount = 0;
  private readonly collectThreshold: number;
  private readonly ttlMs: number;
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(opts: StoreOptions) {
    if (!Number.isInteger(opts.collectThreshold) || opts.collectThreshold < 0) {
      throw new Error(`collectThreshold must be a non-negative integer, got ${opts.collectThreshold}`);
    }
    if (!Number.isFinite(opts.ttlMs) || opts.ttlMs <= 0) {
      throw new Error(`ttlMs must be a positive number, got ${opts.ttlMs}`);
    }
    this.collectThreshold = opts.collectThreshold;
    this.ttlMs = opts.ttlMs;
    this.clock = opts.clock ?? Date.now;
    this.logger = opts.logger ?? createLogger();
  }

  set(id: string, value: string): void {
    const insertedAt = this.clock();
    this.index.set(id, { value, insertedAt });
    this.queue.push({ id, insertedAt });
    this.liveCount++;
    if (this.liveCount > this.collectThreshold) this.scheduleSweep();
  }

  get(id: string, clear: boolean): string {
    const res = this.lookup(id, clear);
    return res.found ? res.value : '';
  }

  /**
   * Same as `get`, but reports whether the id was present so a stored empty
   * string is distinguishable from a miss.
   */
  lookup(id: string, clear: boolean): LookupResult {
    const entry = this.index.get(id);
    if (!entry) return { found: false };
    if (clear) this.index.delete(id);
    // Older than the TTL but not swept yet.
    if (this.isExpired(entry.insertedAt, this.clock())) return { found: false };
    return { found: true, value: entry.value };
  }

  /**
   * Evict expired nodes from the head of the queue. Returns the number of
   * queue nodes removed.
   */
  sweep(): number {
    const now = this.clock();
    let evicted = 0;
    try {
      for (const node of this.queue) {
        assertQueueNode(node, evicted);
        if (!this.isExpired(node.insertedAt, now)) break;
        const entry = this.index.get(node.id);
        // A later set of the same id owns the entry now.
        if (entry && entry.insertedAt <= node.insertedAt) this.index.delete(node.id);
        evicted++;
      }
    } finally {
      if (evicted > 0) {
        this.queue.splice(0, evicted);
        this.liveCount -= evicted;
      }
    }
    if (evicted > 0) {
      this.logger.debug(`sweep evicted ${evicted} node(s), ${this.queue.length} queued`);
    }
    return evicted;
  }

  stats(): StoreStats {
    return { entries: this.index.size, queued: this.queue.length, liveCount: this.liveCount };
  }

  private isExpired(insertedAt: number, now: number): boolean {
    return insertedAt + this.ttlMs < now;
  }

  // Fire-and-forget; concurrent schedulings just run redundant passes.
  private scheduleSweep(): void {
    setImmediate(() => {
      try {
        this.sweep();
      } catch (err) {
        this.logger.error('scheduled sweep failed:', err);
      }
    }).unref();
  }
}
