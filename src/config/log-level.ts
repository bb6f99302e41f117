import type { LogLevel } from '@nestjs/common';

export const DEFAULT_LOG_LEVEL = 'INFO';

const ERROR_LEVELS: LogLevel[] = ['error', 'fatal'];
const WARN_LEVELS: LogLevel[] = [...ERROR_LEVELS, 'warn'];
const INFO_LEVELS: LogLevel[] = [...WARN_LEVELS, 'log'];
const DEBUG_LEVELS: LogLevel[] = [...INFO_LEVELS, 'debug'];
const VERBOSE_LEVELS: LogLevel[] = [...DEBUG_LEVELS, 'verbose'];

/**
 * Nest logger levels enabled by a LOG_LEVEL name (case-insensitive).
 * Unknown names get the INFO set.
 */
export function resolveLogLevels(name: string = DEFAULT_LOG_LEVEL): LogLevel[] {
  switch (name.trim().toUpperCase()) {
    case 'ERROR':
      return [...ERROR_LEVELS];
    case 'WARNING':
    case 'WARN':
      return [...WARN_LEVELS];
    case 'DEBUG':
      return [...DEBUG_LEVELS];
    case 'VERBOSE':
      return [...VERBOSE_LEVELS];
    default:
      return [...INFO_LEVELS];
  }
}
