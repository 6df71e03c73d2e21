import type { LogLevel } from '@nestjs/common';

const ORDERED_LEVELS: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

/**
 * Map a LOG_LEVEL value to the Nest levels that should be enabled.
 * `info` is an alias for Nest's `log`; unknown values fall back to it.
 */
export function resolveLogLevels(level: string): LogLevel[] {
  const normalized = level.trim().toLowerCase();
  const target = normalized === 'info' ? 'log' : normalized;
  const index = ORDERED_LEVELS.findIndex((candidate) => candidate === target);
  return ORDERED_LEVELS.slice(0, (index === -1 ? ORDERED_LEVELS.indexOf('log') : index) + 1);
}
