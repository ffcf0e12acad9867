/**
 * Structured Logger with Pino
 *
 * - JSON logging, ISO timestamps, level labels
 * - Pretty console output in DEV
 * - Daily rotated log files when LOG_TO_FILE=true
 * - Secret redaction
 * - Request tracking via child loggers (see requestContext middleware)
 */

import pino, { type DestinationStream, type StreamEntry } from 'pino';
import { PinoPretty } from 'pino-pretty';
import * as rfs from 'rotating-file-stream';
import path from 'node:path';
import fs from 'node:fs';
import { getLoggingConfig } from '../../config/logging.config.js';

const config = getLoggingConfig();

function buildStreams(): StreamEntry[] {
  const level = config.level;
  if (level === 'silent') {
    return [];
  }

  const streams: StreamEntry[] = [];

  if (config.console) {
    const consoleStream: DestinationStream = config.pretty
      ? PinoPretty({
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname'
        })
      : process.stdout;
    streams.push({ level, stream: consoleStream });
  }

  if (config.toFile) {
    const logsDir = path.resolve(process.cwd(), config.dir);
    fs.mkdirSync(logsDir, { recursive: true });

    streams.push({
      level,
      stream: rfs.createStream('server.log', {
        interval: '1d',
        path: logsDir,
        maxFiles: config.rotateDays,
        compress: 'gzip'
      })
    });
  }

  return streams;
}

export const logger = pino(
  {
    level: config.level,
    redact: {
      paths: config.redactFields,
      censor: '[REDACTED]'
    },
    formatters: {
      level: (label) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime
  },
  pino.multistream(buildStreams())
);

export type Logger = typeof logger;
