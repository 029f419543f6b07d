import { PromiseSource } from './promise.js';

// Largest delay a single timer takes; longer ones fire after 1ms.
export const maxTimerDelayMillis = 2147483647;

export interface TimeoutOptions {
  /** Do not keep the process alive while waiting. */
  unref?: boolean;
}

/**
 * A one-shot deferred callback.
 *
 * {@link Timeout.promise} resolves `true` once the callback ran and `false`
 * when the timeout was cleared before that. Delays beyond
 * {@link maxTimerDelayMillis} are waited out in several steps.
 *
 * @internal
 */
export class Timeout {
  private _cleared = false;
  private _handle: ReturnType<typeof setTimeout> | undefined = undefined;
  private _promiseSource = new PromiseSource<boolean>();

  public get promise() {
    return this._promiseSource.promise;
  }

  public static cleared() {
    const instance = new Timeout();
    instance._cleared = true;
    instance._promiseSource.resolve(false);
    return instance;
  }

  public get isActive() {
    return this._handle !== undefined;
  }

  /** Whether the pending timer keeps the process alive. */
  public get isRefed() {
    return this._handle?.hasRef() ?? false;
  }

  public get isCleared() {
    return this._cleared;
  }

  public static create(callback: () => void, ms?: number | undefined, options?: TimeoutOptions) {
    const instance = new Timeout();
    instance.arm(callback, Math.max(ms ?? 0, 0), options?.unref ?? false);
    return instance;
  }

  public clear() {
    if (this._cleared || this._handle === undefined) {
      return;
    }
    clearTimeout(this._handle);
    this._cleared = true;
    this._handle = undefined;
    this._promiseSource.resolve(false);
  }

  private arm(callback: () => void, remaining: number, unref: boolean) {
    const step = Math.min(remaining, maxTimerDelayMillis);
    this._handle = setTimeout(() => {
      if (remaining > step) {
        this.arm(callback, remaining - step, unref);
        return;
      }
      this._handle = undefined;
      callback();
      this._promiseSource.resolve(true);
    }, step);
    if (unref) {
      this._handle.unref();
    }
  }
}
