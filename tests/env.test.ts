import { describe, it, expect } from 'vitest';
import { loadConfig, parseTtl } from '../src/env.ts';

describe('loadConfig', () => {
  it('falls back to defaults', () => {
    expect(loadConfig({})).toEqual({ collectThreshold: 100, ttlMs: 600_000, logLevel: 'info' });
  });

  it('reads threshold, ttl and log level from the environment', () => {
    const cfg = loadConfig({ STORE_COLLECT_THRESHOLD: '5', STORE_TTL: 'PT30S', LOG_LEVEL: 'DEBUG' });
    expect(cfg).toEqual({ collectThreshold: 5, ttlMs: 30_000, logLevel: 'debug' });
  });

  it('rejects bad values naming the variable', () => {
    expect(() => loadConfig({ STORE_COLLECT_THRESHOLD: 'lots' })).toThrow('Invalid STORE_COLLECT_THRESHOLD: lots');
    expect(() => loadConfig({ STORE_COLLECT_THRESHOLD: '-3' })).toThrow('Invalid STORE_COLLECT_THRESHOLD: -3');
    expect(() => loadConfig({ STORE_TTL: 'soon' })).toThrow('Invalid STORE_TTL: soon');
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow('Invalid LOG_LEVEL: verbose');
  });
});

describe('parseTtl', () => {
  it('accepts ISO-8601 durations and millisecond counts', () => {
    expect(parseTtl('PT10M')).toBe(600_000);
    expect(parseTtl('PT0.5S')).toBe(500);
    expect(parseTtl('1500')).toBe(1500);
    expect(parseTtl(' 250 ')).toBe(250);
  });

  it('rejects zero and malformed durations', () => {
    expect(() => parseTtl('0')).toThrow('Invalid STORE_TTL: 0');
    expect(() => parseTtl('PT0S')).toThrow('Invalid STORE_TTL: PT0S');
    expect(() => parseTtl('ten minutes')).toThrow('Invalid STORE_TTL: ten minutes');
  });
});
