import pino from 'pino';
import { config } from '../config/env.js';

const transport =
  config.NODE_ENV === 'development'
    ? pino.transport({ target: 'pino-pretty', options: { colorize: true } })
    : undefined;

// Generation requests carry the user's brief; only its size goes to the logs.
export const logger = pino(
  {
    level: config.LOG_LEVEL,
    name: 'fb-post-generator',
    redact: {
      paths: ['apiKey', '*.apiKey', 'prompt', '*.prompt'],
      censor: (value) => (typeof value === 'string' ? `[${value.length} chars]` : '[redacted]'),
    },
    serializers: { err: pino.stdSerializers.err },
  },
  transport,
);

export function createChildLogger(service: string) {
  return logger.child({ service });
}
