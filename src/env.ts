import { Duration } from 'luxon';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export type Config = {
  collectThreshold: number; // insertions since the last sweep that trigger a new one
  ttlMs: number; // age beyond which an entry is evicted
  logLevel: LogLevelName;
};

export const DEFAULT_COLLECT_THRESHOLD = 100;
export const DEFAULT_TTL = 'PT10M';

const LOG_LEVELS: readonly LogLevelName[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(val: string): val is LogLevelName {
  return (LOG_LEVELS as readonly string[]).includes(val);
}

/**
 * Parse a TTL given either as an ISO-8601 duration ("PT10M", "PT0.5S") or as a
 * plain millisecond count ("600000").
 */
export function parseTtl(val: string): number {
  const raw = val.trim();
  const ms = /^\d+(\.\d+)?$/.test(raw) ? Number(raw) : Duration.fromISO(raw).toMillis();
  if (!Number.isFinite(ms) || ms <= 0) {
    throw new Error(`Invalid STORE_TTL: ${val}`);
  }
  return ms;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const thresholdStr = env.STORE_COLLECT_THRESHOLD || String(DEFAULT_COLLECT_THRESHOLD);
  const collectThreshold = Number(thresholdStr);
  if (!Number.isInteger(collectThreshold) || collectThreshold < 0) {
    throw new Error(`Invalid STORE_COLLECT_THRESHOLD: ${thresholdStr}`);
  }

  const ttlMs = parseTtl(env.STORE_TTL || DEFAULT_TTL);

  const logLevel = (env.LOG_LEVEL || 'info').toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new Error(`Invalid LOG_LEVEL: ${env.LOG_LEVEL}`);
  }

  return { collectThreshold, ttlMs, logLevel };
}
