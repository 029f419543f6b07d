export { Stopwatch, StopwatchStatus } from './stopwatch.js';
export type { StopwatchOptions } from './stopwatch.js';
export {
  durationToMillis,
  formatDuration,
  HOUR,
  MICROSECOND,
  millisToDuration,
  MILLISECOND,
  MINUTE,
  NANOSECOND,
  parseDuration,
  SECOND,
} from './support/duration.js';
export type { Duration } from './support/duration.js';
export { systemClock } from './support/clock.js';
export type { Clock } from './support/clock.js';
export { formatStamp, instantToDate, millisToInstant } from './support/timestamp.js';
export type { Instant } from './support/timestamp.js';
export { getDefaultOutput, OutputDestination, setDefaultOutput } from './support/output.js';
export type { Output } from './support/output.js';
export { createLogger, getDefaultLogger, nullLogger, setDefaultLogger } from './support/logging.js';
export type { LogFn, Logger } from './support/logging.js';
export { ParseError } from './support/errors/parse.js';
export { LogicError } from './support/errors/common.js';
export { configure, makeConfig, readConfig } from './config.js';
export type { Config, LoggingConfig, PrintConfig } from './config.js';
