#!/usr/bin/env node
import { logger } from '../shared/logger/pino.js';

import { runCli } from './program.js';

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.fatal({ error }, 'pgn2gif crashed');
    process.exitCode = 1;
  });
