/**
 * Pino logger: JSON lines to stdout, plus an optional log file
 */

import pino from 'pino';
import { config } from '../config/index.js';

const level = config.logging.level;

// multistream filters per stream, so each sink gets the configured threshold
const streamLevel: pino.Level = level === 'silent' ? 'fatal' : level;

const streams: pino.StreamEntry[] = [{ level: streamLevel, stream: process.stdout }];

if (config.logging.file && level !== 'silent') {
  streams.push({
    level: streamLevel,
    stream: pino.destination({ dest: config.logging.file, mkdir: true, sync: false }),
  });
}

export const logger = pino(
  {
    name: config.app.name,
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.multistream(streams)
);

export type Logger = typeof logger;
