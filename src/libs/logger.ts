import pino, { type Logger } from 'pino';
import type { LogLevel } from '../config/env';

export type { Logger };

export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({
    name: 'error-webhook-collector',
    level,
    redact: ['req.headers.authorization', 'req.headers.cookie'],
  });
}
