/**
 * Process-wide pino logger.
 *
 * Components take a child logger tagged with their name. Children copy the
 * root level when created, so set the level before building components.
 */

import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

const rootLogger = pino({
  name: 'trackline',
  level: process.env.NODE_ENV === 'test' ? 'silent' : 'info'
});

export function createLogger(component: string): Logger {
  return rootLogger.child({ component });
}

export function setLogLevel(level: string): void {
  rootLogger.level = level;
}
