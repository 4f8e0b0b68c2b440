/**
 * Structured logger (pino)
 */

import pino, { type DestinationStream, type Logger } from 'pino';
import { config } from '../config/index.js';

function createDestination(file: string | undefined): DestinationStream {
  if (!file) {
    return pino.destination(1);
  }

  return pino.multistream([
    { stream: pino.destination(1) },
    { stream: pino.destination({ dest: file, mkdir: true, sync: false }) },
  ]);
}

export const logger: Logger = pino(
  {
    name: config.app.name,
    level: config.app.env === 'test' ? 'silent' : config.logging.level,
    base: { version: config.app.version },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      error: pino.stdSerializers.err,
    },
  },
  createDestination(config.logging.file)
);
