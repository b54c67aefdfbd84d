/**
 * Subsystem Logging
 *
 * Named loggers for each component of the display process, backed by tslog.
 * Every logger created here follows the level and output style set through
 * configureLogging().
 */

import { Logger, type ILogObj } from 'tslog';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
export type LogStyle = 'pretty' | 'json' | 'hidden';

export interface LoggingOptions {
  level: LogLevel;
  style: LogStyle;
}

export interface SubsystemLogger {
  readonly subsystem: string;
  trace(message: string, ...meta: unknown[]): void;
  debug(message: string, ...meta: unknown[]): void;
  info(message: string, ...meta: unknown[]): void;
  warn(message: string, ...meta: unknown[]): void;
  error(message: string, ...meta: unknown[]): void;
  fatal(message: string, ...meta: unknown[]): void;
  isEnabled(level: LogLevel): boolean;
}

// tslog numbers its levels 0 (silly) to 6 (fatal)
const LEVEL_IDS: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

const options: LoggingOptions = {
  level: 'info',
  style: 'pretty',
};

const registry = new Map<string, Logger<ILogObj>>();

function createBackend(subsystem: string): Logger<ILogObj> {
  return new Logger<ILogObj>({
    name: subsystem,
    type: options.style,
    minLevel: LEVEL_IDS[options.level],
    prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} [{{name}}] ',
  });
}

/**
 * Creates (or returns the existing) logger for a subsystem such as
 * `oled/scheduler`.
 */
export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  let backend = registry.get(subsystem);
  if (!backend) {
    backend = createBackend(subsystem);
    registry.set(subsystem, backend);
  }
  const logger = backend;

  return {
    subsystem,
    trace: (message, ...meta) => { logger.trace(message, ...meta); },
    debug: (message, ...meta) => { logger.debug(message, ...meta); },
    info: (message, ...meta) => { logger.info(message, ...meta); },
    warn: (message, ...meta) => { logger.warn(message, ...meta); },
    error: (message, ...meta) => { logger.error(message, ...meta); },
    fatal: (message, ...meta) => { logger.fatal(message, ...meta); },
    isEnabled: (level) => LEVEL_IDS[level] >= logger.settings.minLevel,
  };
}

/**
 * Applies a new level and style to every subsystem logger, including the
 * ones already handed out.
 */
export function configureLogging(update: Partial<LoggingOptions>): LoggingOptions {
  if (update.level !== undefined) {
    options.level = update.level;
  }
  if (update.style !== undefined) {
    options.style = update.style;
  }

  for (const backend of registry.values()) {
    backend.settings.minLevel = LEVEL_IDS[options.level];
    backend.settings.type = options.style;
  }

  return { ...options };
}

export function getLoggingOptions(): LoggingOptions {
  return { ...options };
}

/**
 * Formats an unknown thrown value for log metadata.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
