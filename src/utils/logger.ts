import pino from 'pino';
import type { Logger } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';

/**
 * Build a structured pino logger
 *
 * - ISO timestamps
 * - Textual level labels
 * - Secret-looking fields redacted
 * - pino-pretty in development
 */
export function createLogger(
  level: string = LOG_LEVEL,
  nodeEnv: string | undefined = process.env['NODE_ENV']
): Logger {
  return pino({
    level,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ['*.password', '*.token', '*.secret', '*.apiKey', '*.api_key'],
      censor: '[REDACTED]',
    },
    serializers: pino.stdSerializers,
    transport:
      nodeEnv === 'development'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
  });
}

export const logger = createLogger();
