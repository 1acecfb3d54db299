// /src/lib/logger.ts

import pino, { type Logger } from 'pino';
import { LOG_LEVELS, type LogLevel } from '@/lib/config';

const isLogLevel = (value: string | undefined): value is LogLevel =>
  LOG_LEVELS.some(level => level === value);

// An unknown LOG_LEVEL is reported by loadConfig, not at import
const envLevel = process.env.LOG_LEVEL;

/**
 * Structured JSON logs on stderr, so stdout stays free for whatever
 * embeds the client.
 */
export const logger: Logger = pino(
  {
    level: isLogLevel(envLevel) ? envLevel : 'info',
    formatters: {
      level: (label: string) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: ['token', 'password', 'headers.Authorization'],
  },
  pino.destination(2)
);

// Children copy the level when created, so setLogLevel walks them too
const children = new Map<string, Logger>();

// One child per module name
export const createLogger = (module: string): Logger => {
  const existing = children.get(module);
  if (existing) return existing;
  const child = logger.child({ module });
  children.set(module, child);
  return child;
};

export const setLogLevel = (level: LogLevel): void => {
  logger.level = level;
  children.forEach(child => {
    child.level = level;
  });
};
