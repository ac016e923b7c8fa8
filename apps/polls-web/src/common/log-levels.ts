import { LogLevel } from '@nestjs/common';

const LEVELS_BY_SETTING: Record<string, LogLevel[]> = {
  debug: ['error', 'warn', 'log', 'debug', 'verbose'],
  info: ['error', 'warn', 'log'],
  warn: ['error', 'warn'],
  error: ['error'],
};

/** Maps LOG_LEVEL onto the Nest logger levels it enables. Unknown values fall back to info. */
export function resolveLogLevels(setting: string | undefined): LogLevel[] {
  return LEVELS_BY_SETTING[(setting || 'info').toLowerCase()] || LEVELS_BY_SETTING.info;
}
