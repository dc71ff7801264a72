import pino from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const logger = pino({
  name: 'sheet-intake',
  level: process.env.LOG_LEVEL ?? 'info',
  base: { pid: process.pid },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type { Logger } from 'pino';

/** Applied once at startup, after configuration has been validated. */
export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
