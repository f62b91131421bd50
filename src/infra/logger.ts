import { pino, type Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level?: string;
  name?: string;
}

/**
 * Structured JSON logger shared by the HTTP layer, the stores and the use cases.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    base: { name: options.name ?? 'session-auth-core' },
    redact: ['password', 'passwordHash', 'refreshToken', 'accessToken', 'token'],
  });
}
