import type { Logger } from '../src/util/logger.ts';
import { LogLevel } from '@slack/logger';

export function fakeClock(start = 1_000) {
  let t = start;
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
  };
}

export function recordingLogger() {
  const errors: unknown[][] = [];
  const debugs: unknown[][] = [];
  let level = LogLevel.DEBUG;
  const logger: Logger = {
    debug: (...msg: unknown[]) => {
      debugs.push(msg);
    },
    info: () => {},
    warn: () => {},
    error: (...msg: unknown[]) => {
      errors.push(msg);
    },
    setLevel: (l: LogLevel) => {
      level = l;
    },
    getLevel: () => level,
    setName: () => {},
  };
  return { logger, errors, debugs };
}

export const nextTick = () => new Promise<void>((resolve) => setImmediate(resolve));
export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));
