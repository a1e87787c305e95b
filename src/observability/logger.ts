import pino from 'pino';
import { env } from '../config/env.js';

export const logger = pino({
  level: env.logLevel,
  formatters: {
    level(label) {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: {
    err: pino.stdSerializers.err,
  },
});

/** Create a child logger with a request / correlation id */
export function childLogger(requestId: string, extra?: Record<string, unknown>): pino.Logger {
  return logger.child({ requestId, ...extra });
}
