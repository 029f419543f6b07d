import { MILLISECOND } from './duration.js';

/**
 * A point in time in nanoseconds since the Unix epoch.
 */
export type Instant = bigint;

const months = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

/** How the zero instant of a stopwatch that never started is printed. */
export const zeroStamp = 'Jan  1 00:00:00';

export function millisToInstant(millis: number): Instant {
  const whole = Math.floor(millis);
  const fraction = millis - whole;
  return BigInt(whole) * MILLISECOND + BigInt(Math.floor(fraction * 1000000));
}

export function instantToDate(instant: Instant) {
  return new Date(Number(instant / MILLISECOND));
}

/**
 * Formats an instant in local time as `Jan _2 15:04:05`, the day padded
 * with a space. `null` stands for the zero instant.
 */
export function formatStamp(instant: Instant | null) {
  if (instant === null) {
    return zeroStamp;
  }
  const date = instantToDate(instant);
  const day = String(date.getDate()).padStart(2, ' ');
  const time = [date.getHours(), date.getMinutes(), date.getSeconds()].map(n => String(n).padStart(2, '0')).join(':');
  return `${months[date.getMonth()]} ${day} ${time}`;
}
