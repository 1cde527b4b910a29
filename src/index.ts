export { TimedStore, StoreInvariantError } from './store/memoryStore.js';
export { createMemoryStore, getStore, setCustomStore, resetStore, DEFAULT_TTL_MS } from './store/registry.js';
export type { Store, StoreOptions, LookupResult, StoreStats } from './store/types.js';
export { loadConfig, parseTtl, DEFAULT_COLLECT_THRESHOLD } from './env.js';
export type { Config, LogLevelName } from './env.js';
export { createLogger } from './util/logger.js';
export type { Logger } from './util/logger.js';
