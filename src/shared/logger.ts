import pino from 'pino';

// JSON lines go to stderr; stdout is reserved for the CLI's progress text.
export const logger = pino(
  {
    name: 'mirror-sync',
    level: process.env['NODE_ENV'] === 'test' ? 'silent' : (process.env['LOG_LEVEL'] ?? 'info'),
  },
  pino.destination(2)
);

export type Logger = pino.Logger;

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
