import pino, { type Logger } from 'pino';

import { resolveLogLevel } from '../config/env.js';

export const logger: Logger = pino(
  {
    name: 'pgn2gif',
    level: resolveLogLevel(),
  },
  // stdout is left to the CLI's own output
  pino.destination(2),
);

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
