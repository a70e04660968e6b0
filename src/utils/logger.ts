import pino, { type Logger } from 'pino';
import type { Config } from '../config.js';
import { logSerializers } from './log-sanitizer.js';

/**
 * Root logger with sanitization serializers.
 * Components derive their own with logger.child({ component }).
 */
export function createLogger(config: Pick<Config, 'logLevel' | 'nodeEnv'>): Logger {
  return pino({
    level: config.logLevel,
    serializers: {
      ...pino.stdSerializers,
      ...logSerializers,
    },
    transport:
      config.nodeEnv === 'development'
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
  });
}
