// Process-wide pino logger for services; the HTTP server builds its own from the same settings

import pino, { type Logger } from 'pino';
import { env } from './env.js';

export interface PrettyTransport {
  target: 'pino-pretty';
  options: { translateTime: string; ignore: string };
}

export const LOG_LEVEL = env.NODE_ENV === 'test' ? 'silent' : env.LOG_LEVEL;

export function prettyTransport(): PrettyTransport | undefined {
  if (env.NODE_ENV === 'production' || env.NODE_ENV === 'test') return undefined;
  return {
    target: 'pino-pretty',
    options: {
      translateTime: 'HH:MM:ss Z',
      ignore: 'pid,hostname',
    },
  };
}

export const logger: Logger = pino({
  level: LOG_LEVEL,
  transport: prettyTransport(),
});

export type { Logger };

export function componentLogger(component: string, parent: Logger = logger): Logger {
  return parent.child({ component });
}
