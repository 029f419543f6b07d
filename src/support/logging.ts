import { pino } from 'pino';
import type { LoggingConfig } from '../config.js';
import defaults from '../defaults.js';
import { Output, resolveOutput } from './output.js';

// Pino interface.
export interface LogFn {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  <T extends object>(obj: T, msg?: string, ...args: any[]): void;
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  (obj: unknown, msg?: string, ...args: any[]): void;
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  (msg: string, ...args: any[]): void;
}

export interface Logger {
  fatal: LogFn;
  error: LogFn;
  warn: LogFn;
  info: LogFn;
  debug: LogFn;
  trace: LogFn;
}

export const nullLogger: Logger = new (class implements Logger {
  fatal() {
    // Nothing
  }
  error() {
    // Nothing
  }
  warn() {
    // Nothing
  }
  info() {
    // Nothing
  }
  debug() {
    // Nothing
  }
  trace() {
    // Nothing
  }
})();

/**
 * Creates a pino logger. `output` takes the place of the configured
 * destination when given.
 */
export function createLogger(config: Readonly<LoggingConfig>, output?: Output): Logger {
  return pino({ name: config.name, level: config.level }, output ?? resolveOutput(config.destination));
}

let defaultLogger: Logger | null = null;

/**
 * The process-wide logger used by stopwatches that were not given one.
 * Created from the defaults on first use.
 */
export function getDefaultLogger() {
  if (defaultLogger === null) {
    defaultLogger = createLogger(defaults.logging);
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: Logger) {
  defaultLogger = logger;
}
