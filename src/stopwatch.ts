import { Clock, systemClock } from './support/clock.js';
import { Duration, durationToMillis, formatDuration, parseDuration } from './support/duration.js';
import { LogicError } from './support/errors/common.js';
import { getDefaultLogger, Logger } from './support/logging.js';
import { getDefaultOutput, Output } from './support/output.js';
import { formatStamp, Instant } from './support/timestamp.js';
import { Timeout } from './support/timeout.js';

export enum StopwatchStatus {
  Reset = 'reset',
  Running = 'running',
  Stopped = 'stopped',
}

interface ResetState {
  status: StopwatchStatus.Reset;
}

interface RunningState {
  status: StopwatchStatus.Running;
  start: Instant;
  lastLap: Instant;
  laps: Duration[];
}

interface StoppedState {
  status: StopwatchStatus.Stopped;
  start: Instant;
  stop: Instant;
  lastLap: Instant;
  laps: Duration[];
}

type StopwatchState = ResetState | RunningState | StoppedState;

export interface StopwatchOptions {
  /** Source of the current instant. Defaults to the system clock. */
  clock?: Clock;
  /** Sink of {@link Stopwatch.log}. Defaults to the process-wide logger. */
  logger?: Logger;
  /** Sink of {@link Stopwatch.print}. Defaults to the process-wide output. */
  output?: Output;
}

const resetState: ResetState = { status: StopwatchStatus.Reset };
const zero: Duration = BigInt(0);
const emptyLaps: readonly Duration[] = [];

/**
 * Measures elapsed time with support for pausing, laps and serialization to
 * a duration text.
 *
 * A stopwatch is not safe for concurrent use; callers sharing one have to
 * serialize access themselves.
 *
 * @example
 * ```ts
 * const stopwatch = Stopwatch.start();
 * await work();
 * stopwatch.print('work'); // work - elapsed: 2.000629842s
 * ```
 */
export class Stopwatch {
  private _state: StopwatchState = resetState;
  private _clock: Clock;
  private _logger: Logger | undefined;
  private _output: Output | undefined;
  private _delayedStart = Timeout.cleared();

  /**
   * Creates a stopwatch in the reset state. Call {@link Stopwatch.start} to
   * begin measuring.
   */
  public constructor(options?: StopwatchOptions) {
    this._clock = options?.clock ?? systemClock;
    this._logger = options?.logger;
    this._output = options?.output;
  }

  /**
   * Creates a stopwatch which is running already.
   */
  public static start(options?: StopwatchOptions) {
    const stopwatch = new Stopwatch(options);
    stopwatch.init();
    return stopwatch;
  }

  /**
   * Creates a stopwatch which starts after `ms` milliseconds. Until then it
   * reads as reset. The pending start does not keep the process alive.
   */
  public static after(ms: number, options?: StopwatchOptions) {
    if (!Number.isFinite(ms)) {
      throw new LogicError(`Invalid delay: ${ms}.`);
    }
    const stopwatch = new Stopwatch(options);
    stopwatch._delayedStart = Timeout.create(() => stopwatch.init(), ms, { unref: true });
    return stopwatch;
  }

  /**
   * Creates a running stopwatch whose elapsed time equals the serialized
   * duration.
   *
   * @throws {ParseError}
   */
  public static fromJSON(data: string, options?: StopwatchOptions) {
    const stopwatch = new Stopwatch(options);
    stopwatch.unmarshalJSON(data);
    return stopwatch;
  }

  public get status() {
    return this._state.status;
  }

  /**
   * Resolves `true` once a delayed start has fired and `false` when there is
   * none or it was superseded by {@link start}, {@link reset} or
   * {@link unmarshalJSON}.
   */
  public get ready() {
    return this._delayedStart.promise;
  }

  /**
   * Elapsed time in nanoseconds. Frozen while stopped, zero while reset.
   */
  public get elapsed(): Duration {
    const state = this._state;
    switch (state.status) {
      case StopwatchStatus.Reset:
        return zero;
      case StopwatchStatus.Running:
        return this._clock.now() - state.start;
      case StopwatchStatus.Stopped:
        return state.stop - state.start;
    }
  }

  public get elapsedMillis() {
    return durationToMillis(this.elapsed);
  }

  /**
   * The recorded laps in recording order.
   */
  public get laps(): readonly Duration[] {
    return this._state.status === StopwatchStatus.Reset ? emptyLaps : this._state.laps;
  }

  /**
   * Starts a new session when reset, or resumes when stopped. The time spent
   * stopped is not counted. Does nothing while running.
   */
  public start() {
    const state = this._state;
    switch (state.status) {
      case StopwatchStatus.Reset:
        this.init();
        break;
      case StopwatchStatus.Stopped: {
        const paused = this._clock.now() - state.stop;
        this._state = {
          status: StopwatchStatus.Running,
          start: state.start + paused,
          lastLap: state.lastLap + paused,
          laps: state.laps,
        };
        break;
      }
      case StopwatchStatus.Running:
        break;
    }
  }

  /**
   * Stops the stopwatch and returns the elapsed time. Stopping again moves
   * the stop instant to now. Does nothing while reset.
   */
  public stop() {
    const state = this._state;
    if (state.status !== StopwatchStatus.Reset) {
      this._state = {
        status: StopwatchStatus.Stopped,
        start: state.start,
        stop: this._clock.now(),
        lastLap: state.lastLap,
        laps: state.laps,
      };
    }
    return this.elapsed;
  }

  public reset() {
    this._delayedStart.clear();
    this._state = resetState;
  }

  /**
   * Records a lap and returns the time since the previous one, or since the
   * start for the first lap. Returns zero without recording anything unless
   * running.
   */
  public lap(): Duration {
    const state = this._state;
    if (state.status !== StopwatchStatus.Running) {
      return zero;
    }
    const now = this._clock.now();
    const lap = now - state.lastLap;
    state.lastLap = now;
    state.laps.push(lap);
    return lap;
  }

  /**
   * Writes `<label> - elapsed: <elapsed>` as a line to the output.
   */
  public print(label: string) {
    const output = this._output ?? getDefaultOutput();
    output.write(`${this.formatMessage(label)}\n`);
  }

  /**
   * Logs `<label> - elapsed: <elapsed>` at info level.
   */
  public log(label: string) {
    const logger = this._logger ?? getDefaultLogger();
    logger.info(this.formatMessage(label));
  }

  public toString() {
    const start = this._state.status === StopwatchStatus.Reset ? null : this._state.start;
    const current = formatStamp(this._clock.now());
    return `[start: ${formatStamp(start)} current: ${current} elapsed: ${formatDuration(this.elapsed)}]`;
  }

  /**
   * The elapsed time as duration text, used by `JSON.stringify`.
   */
  public toJSON() {
    return formatDuration(this.elapsed);
  }

  /**
   * The elapsed time as a quoted duration text, e.g. `"72h3m0.5s"`.
   */
  public marshalJSON() {
    return `"${this.toJSON()}"`;
  }

  /**
   * Restores the elapsed time from a quoted duration text. The stopwatch runs
   * afterwards, its start set back from now by the parsed duration. Recorded
   * laps are kept.
   *
   * @throws {ParseError} The stopwatch is left unchanged.
   */
  public unmarshalJSON(data: string) {
    const duration = parseDuration(data.replace(/"/g, ''));

    this._delayedStart.clear();
    const state = this._state;
    const start = this._clock.now() - duration;
    this._state = {
      status: StopwatchStatus.Running,
      start,
      lastLap: state.status === StopwatchStatus.Reset ? start : state.lastLap,
      laps: state.status === StopwatchStatus.Reset ? [] : state.laps,
    };
  }

  private init() {
    this._delayedStart.clear();
    const now = this._clock.now();
    this._state = {
      status: StopwatchStatus.Running,
      start: now,
      lastLap: now,
      laps: [],
    };
  }

  private formatMessage(label: string) {
    return `${label} - elapsed: ${formatDuration(this.elapsed)}`;
  }
}
