import pino from 'pino';

/**
 * Process-wide logger. Writes to stderr so a stdio MCP transport keeps
 * stdout to itself.
 */
export const logger = pino(
  {
    level: process.env.LOG_LEVEL || 'info',
    base: { service: 'pvelens' },
    redact: {
      paths: ['tokenSecret', 'credentials.tokenSecret', 'headers.Authorization'],
      remove: true,
    },
  },
  pino.destination(2),
);

export function createLogger(component: string) {
  return logger.child({ component });
}
