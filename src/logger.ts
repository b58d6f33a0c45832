import pino, { type Logger } from 'pino';

export type { Logger };

export function createLogger(level: string = process.env['LOG_LEVEL'] ?? 'info'): Logger {
  return pino({
    name: 'a2a-points',
    level,
    redact: {
      paths: ['*.apiKey', '*.oracleApiKey', '*.mongoUrl', 'headers["x-api-key"]'],
      censor: '[REDACTED]',
    },
  });
}

/** Shared default for components constructed without a logger */
export const logger = createLogger();
