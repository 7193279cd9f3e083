/**
 * Structured logging utility using pino
 *
 * All output goes to stderr: stdout belongs to the data stream (or to the
 * resolved configuration printed by the CLI). Logging is disabled under
 * Vitest to keep test output clean.
 */

import pino from 'pino';
import pretty from 'pino-pretty';
import { buildLoggerConfig } from '../config/index.js';
import { Verbosity } from '../core/types.js';

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const config = buildLoggerConfig();
const isTest = config.runtime.nodeEnv === 'test' || process.env.VITEST !== undefined;

const pinoOptions: pino.LoggerOptions = {
  name: 'xzopt',
  level: config.logging.level,
  enabled: !isTest,
  serializers: {
    err: pino.stdSerializers.err,
  },
};

// Synchronous destinations: the CLI exits right after logging a fatal error
export const logger = config.logging.pretty
  ? pino(
      pinoOptions,
      pretty({
        destination: 2,
        sync: true,
        colorize: process.stderr.isTTY,
        ignore: 'pid,hostname',
      })
    )
  : pino(pinoOptions, pino.destination({ dest: 2, sync: true }));

// pino children copy the level once; setLogLevel walks them
const componentLoggers: pino.Logger[] = [];

/**
 * Create a child logger with component context
 */
export function createComponentLogger(component: string): pino.Logger {
  const child = logger.child({ component });
  componentLoggers.push(child);
  return child;
}

export function verbosityToLogLevel(verbosity: Verbosity): LogLevel {
  switch (verbosity) {
    case Verbosity.Silent:
      return 'silent';
    case Verbosity.Error:
      return 'error';
    case Verbosity.Warning:
      return 'warn';
    case Verbosity.Verbose:
      return 'info';
    case Verbosity.Debug:
      return 'debug';
  }
}

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  for (const child of componentLoggers) {
    child.level = level;
  }
}
