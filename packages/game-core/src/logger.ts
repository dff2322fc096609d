// packages/game-core/src/logger.ts
//
// pino logger shared by the package. It is built on first use, at the level
// named by LOG_LEVEL (see config.ts), so importing the package reads nothing.

import { pino, type Logger } from 'pino';

import { loadLogLevel, type LogLevel } from './config.js';

export function createLogger(level: LogLevel, name = 'game-core'): Logger {
  return pino({ name, level });
}

let shared: Logger | undefined;

/** The package logger, used wherever no logger is injected. */
export function defaultLogger(): Logger {
  shared ??= createLogger(loadLogLevel());
  return shared;
}
