/**
 * Pino logger factory.
 *
 * The runner logs through a pino Logger with child bindings per run
 * (`agent`, `turn`, `tool`). Level comes from config, then LOG_LEVEL, then
 * 'warn'.
 */

import { pino } from 'pino';
import type { DestinationStream, Logger, LoggerOptions } from 'pino';
import { LogLevelSchema, type LogLevel } from '@turnkit/agent-contracts';

export type { Logger } from 'pino';

export interface LoggerConfig {
  level?: LogLevel;
  /** Base bindings (always included in logs) */
  base?: Record<string, unknown>;
  /** Defaults to stdout */
  destination?: DestinationStream;
}

const DEFAULT_LEVEL: LogLevel = 'warn';

export function resolveLogLevel(level?: LogLevel): LogLevel {
  if (level) {
    return level;
  }
  const fromEnv = LogLevelSchema.safeParse(process.env.LOG_LEVEL);
  return fromEnv.success ? fromEnv.data : DEFAULT_LEVEL;
}

export function createLogger(config: LoggerConfig = {}): Logger {
  const options: LoggerOptions = {
    level: resolveLogLevel(config.level),
    base: { service: 'turnkit', ...config.base },
  };
  return config.destination ? pino(options, config.destination) : pino(options);
}

/** Logger that drops everything; used when a caller wants no output */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}
