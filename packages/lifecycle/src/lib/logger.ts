import { pino } from 'pino';
import type { Logger } from 'pino';
import { getEngineConfig } from './config/engine.js';

export type { Logger };

let rootLogger: Logger | null = null;

/**
 * Root logger for the lifecycle engine, created on first use so LOG_LEVEL is
 * read after dotenv has loaded.
 */
export function getLogger(): Logger {
  if (!rootLogger) {
    rootLogger = pino({
      name: 'roster-lifecycle',
      level: getEngineConfig().logLevel,
    });
  }
  return rootLogger;
}

export function createLogger(module: string, parent: Logger = getLogger()): Logger {
  return parent.child({ module });
}
