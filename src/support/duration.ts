import { ParseError } from './errors/parse.js';

/**
 * A span of time in nanoseconds.
 */
export type Duration = bigint;

export const NANOSECOND: Duration = BigInt(1);
export const MICROSECOND: Duration = BigInt(1000) * NANOSECOND;
export const MILLISECOND: Duration = BigInt(1000) * MICROSECOND;
export const SECOND: Duration = BigInt(1000) * MILLISECOND;
export const MINUTE: Duration = BigInt(60) * SECOND;
export const HOUR: Duration = BigInt(60) * MINUTE;

const ZERO = BigInt(0);
const TEN = BigInt(10);
// Durations are bounded to the signed 64-bit range.
const LIMIT = BigInt(1) << BigInt(63);

const units: Readonly<Partial<Record<string, Duration>>> = {
  ns: NANOSECOND,
  us: MICROSECOND,
  'µs': MICROSECOND, // micro sign
  'μs': MICROSECOND, // greek mu
  ms: MILLISECOND,
  s: SECOND,
  m: MINUTE,
  h: HOUR,
};

/**
 * Formats a duration in its canonical text form, for example `72h3m0.5s`,
 * `1.5ms` or `0s`.
 *
 * Below one second the largest fitting unit of `ns`, `µs` and `ms` is used.
 * From one second on the value is split into hours, minutes and seconds,
 * leading zero units omitted.
 */
export function formatDuration(duration: Duration) {
  if (duration === ZERO) {
    return '0s';
  }

  const sign = duration < ZERO ? '-' : '';
  const u = duration < ZERO ? -duration : duration;

  if (u < SECOND) {
    if (u < MICROSECOND) {
      return `${sign}${u}ns`;
    }
    const [fraction, whole] = u < MILLISECOND ? formatFraction(u, 3) : formatFraction(u, 6);
    const unit = u < MILLISECOND ? 'µs' : 'ms';
    return `${sign}${whole}${fraction}${unit}`;
  }

  const [fraction, secs] = formatFraction(u, 9);
  let text = `${secs % BigInt(60)}${fraction}s`;
  const minutes = secs / BigInt(60);
  if (minutes > ZERO) {
    text = `${minutes % BigInt(60)}m${text}`;
    const hours = minutes / BigInt(60);
    if (hours > ZERO) {
      text = `${hours}h${text}`;
    }
  }
  return sign + text;
}

/**
 * Splits off the lowest `precision` decimal digits of `value`. Returns the
 * fraction as `.ddd` with trailing zeros dropped (empty when all digits are
 * zero) and the remaining integral part.
 */
function formatFraction(value: bigint, precision: number): [string, bigint] {
  let digits = '';
  let print = false;
  for (let i = 0; i < precision; i++) {
    const digit = value % TEN;
    print = print || digit !== ZERO;
    if (print) {
      digits = `${digit}${digits}`;
    }
    value /= TEN;
  }
  return [print ? `.${digits}` : '', value];
}

/**
 * Parses a duration text such as `300ms`, `-1.5h` or `2h45m`.
 *
 * The text is an optional sign followed by a sequence of decimal numbers,
 * each with an optional fraction and a unit suffix. Valid units are `ns`,
 * `us` (or `µs`), `ms`, `s`, `m` and `h`.
 *
 * @throws {ParseError} When the text is not a valid duration.
 */
export function parseDuration(input: string): Duration {
  let s = input;
  let negative = false;

  if (s !== '' && (s[0] === '-' || s[0] === '+')) {
    negative = s[0] === '-';
    s = s.slice(1);
  }
  if (s === '0') {
    return ZERO;
  }
  if (s === '') {
    throw invalidDuration(input);
  }

  let total = ZERO;
  while (s !== '') {
    if (s[0] !== '.' && !isDigit(s[0])) {
      throw invalidDuration(input);
    }

    const number = /^([0-9]*)(?:\.([0-9]*))?/.exec(s);
    const wholeDigits = number?.[1] ?? '';
    const fractionDigits = number?.[2] ?? '';
    if (wholeDigits === '' && fractionDigits === '') {
      throw invalidDuration(input);
    }
    s = s.slice(number?.[0].length ?? 0);

    const unitText = /^[^.0-9]*/.exec(s)?.[0] ?? '';
    if (unitText === '') {
      throw new ParseError(`missing unit in duration ${quote(input)}`, input);
    }
    s = s.slice(unitText.length);

    const unit = units[unitText];
    if (unit === undefined) {
      throw new ParseError(`unknown unit ${quote(unitText)} in duration ${quote(input)}`, input);
    }

    let value = BigInt(wholeDigits === '' ? 0 : wholeDigits);
    if (value > LIMIT / unit) {
      throw invalidDuration(input);
    }
    value *= unit;
    if (fractionDigits !== '') {
      value += (BigInt(fractionDigits) * unit) / TEN ** BigInt(fractionDigits.length);
      if (value > LIMIT) {
        throw invalidDuration(input);
      }
    }

    total += value;
    if (total > LIMIT) {
      throw invalidDuration(input);
    }
  }

  if (negative) {
    return -total;
  }
  if (total > LIMIT - NANOSECOND) {
    throw invalidDuration(input);
  }
  return total;
}

export function durationToMillis(duration: Duration) {
  const whole = duration / MILLISECOND;
  const rest = duration % MILLISECOND;
  return Number(whole) + Number(rest) / 1000000;
}

export function millisToDuration(ms: number): Duration {
  return BigInt(Math.round(ms * 1000000));
}

function isDigit(c: string) {
  return c >= '0' && c <= '9';
}

function quote(text: string) {
  return JSON.stringify(text);
}

function invalidDuration(input: string) {
  return new ParseError(`invalid duration ${quote(input)}`, input);
}
