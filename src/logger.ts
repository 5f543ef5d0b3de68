/**
 * Adapter logging. Lines go to the console with a fixed prefix unless
 * another sink is supplied.
 */

// Copyright 2025 Sushanth (https://github.com/sushanthpy)
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0

export const LOG_PREFIX = '[CosmosAdapter]';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Where log lines end up; `console` satisfies it. */
export type LogSink = Pick<Console, 'debug' | 'log' | 'warn' | 'error'>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Create a logger that drops messages below `level`.
 *
 * @example
 * ```typescript
 * const logger = createLogger('debug');
 * logger.info('Provisioned casbin/casbin_rule');
 * // [CosmosAdapter] Provisioned casbin/casbin_rule
 * ```
 */
export function createLogger(level: LogLevel = 'info', sink: LogSink = console): Logger {
  const enabled = (messageLevel: LogLevel): boolean =>
    LEVEL_ORDER[messageLevel] >= LEVEL_ORDER[level];

  return {
    debug(message: string): void {
      if (enabled('debug')) sink.debug(`${LOG_PREFIX} ${message}`);
    },
    info(message: string): void {
      if (enabled('info')) sink.log(`${LOG_PREFIX} ${message}`);
    },
    warn(message: string): void {
      if (enabled('warn')) sink.warn(`${LOG_PREFIX} ${message}`);
    },
    error(message: string): void {
      if (enabled('error')) sink.error(`${LOG_PREFIX} ${message}`);
    },
  };
}
