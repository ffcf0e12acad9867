/**
 * Logging Configuration
 * Single source of truth for all logging behavior
 */

import { z } from 'zod';

export type LogLevelName = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggingConfig {
  level: LogLevelName;
  pretty: boolean;
  toFile: boolean;
  dir: string;
  rotateDays: number;
  console: boolean;
  redactFields: string[];
}

const levelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export function getLoggingConfig(source: NodeJS.ProcessEnv = process.env): LoggingConfig {
  const isDev = source.NODE_ENV !== 'production';
  const level = levelSchema.safeParse(source.LOG_LEVEL);

  return {
    level: level.success ? level.data : 'info',
    pretty: source.LOG_PRETTY !== undefined ? source.LOG_PRETTY === 'true' : isDev,
    // Rotating file stream holds a timer; opt-in only
    toFile: source.LOG_TO_FILE === 'true',
    dir: source.LOG_DIR || './logs',
    rotateDays: Number(source.LOG_ROTATE_DAYS || 14),
    console: source.LOG_CONSOLE !== 'false',
    redactFields: (source.LOG_REDACT_FIELDS ||
      'authorization,cookie,password,secret,token,req.headers.authorization,req.headers.cookie')
      .split(',')
      .map((f) => f.trim())
      .filter((f) => f !== '')
  };
}
