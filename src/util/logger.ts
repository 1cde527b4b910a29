import { ConsoleLogger, LogLevel } from '@slack/logger';
import type { Logger } from '@slack/logger';
import type { LogLevelName } from '../env.js';

export type { Logger };

const LEVELS: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export function createLogger(level: LogLevelName = 'info', name = 'timed-store'): Logger {
  const logger = new ConsoleLogger();
  logger.setName(name);
  logger.setLevel(LEVELS[level]);
  return logger;
}
