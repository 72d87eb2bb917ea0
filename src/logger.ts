/**
 * Structured Logging Module
 *
 * Provides pino-based structured logging with scoped child loggers.
 * Supports JSON output for production and pretty-printing for development.
 *
 * Module loggers are created at import time, before the config is read.
 * They all write through one output that initLogger repoints, so a later
 * level or pretty setting reaches every logger.
 */

import pino, { DestinationStream, Logger } from 'pino';
import pretty from 'pino-pretty';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggerConfig {
  level?: LogLevel;
  pretty?: boolean;
  /** Where JSON lines go; stdout by default. Pretty output always goes to stdout. */
  destination?: DestinationStream;
}

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

let rootLogger: Logger | null = null;
let destination: DestinationStream | null = null;
const moduleLoggers: Logger[] = [];

// Fixed stream handed to pino; forwards to whatever initLogger picked last
const output: DestinationStream = {
  write(line: string): void {
    destination?.write(line);
  },
};

function levelFromEnv(): LogLevel | undefined {
  const raw = process.env.LOG_LEVEL;
  return LOG_LEVELS.find((level) => level === raw);
}

function createDestination(config: LoggerConfig, level: LogLevel): DestinationStream {
  const usePretty = config.pretty ?? process.env.NODE_ENV !== 'production';
  if (!usePretty || level === 'silent') {
    return config.destination ?? pino.destination({ dest: 1, sync: true });
  }
  return pretty({
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'pid,hostname',
    messageFormat: '[{module}] {msg}',
    destination: 1,
    sync: true,
  });
}

/**
 * Initialize the root logger. Call once at startup; calling again
 * repoints the output and level of every logger handed out so far.
 */
export function initLogger(config: LoggerConfig = {}): Logger {
  const level = config.level ?? levelFromEnv() ?? 'info';
  destination = createDestination(config, level);

  if (!rootLogger) {
    rootLogger = pino({ level }, output);
  } else {
    rootLogger.level = level;
  }
  for (const child of moduleLoggers) {
    child.level = level;
  }
  return rootLogger;
}

/**
 * Get the root logger instance.
 */
export function getRootLogger(): Logger {
  return rootLogger ?? initLogger();
}

/**
 * Get a scoped logger for a specific module.
 * Auto-initializes if not already initialized.
 */
export function getLogger(module: string): Logger {
  const child = getRootLogger().child({ module });
  moduleLoggers.push(child);
  return child;
}
