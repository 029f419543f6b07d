import test from 'ava';
import { formatStamp, instantToDate, millisToInstant, zeroStamp } from './timestamp.js';

test('millis to instant keeps sub-millisecond precision', t => {
  t.is(millisToInstant(1500), BigInt(1500000000));
  t.is(millisToInstant(2.25), BigInt(2250000));
});

test('instant to date', t => {
  t.is(instantToDate(BigInt('1700000000123456789')).getTime(), 1700000000123);
});

test('stamp pads the day with a space', t => {
  const instant = millisToInstant(new Date(2024, 0, 5, 9, 3, 7).getTime());
  t.is(formatStamp(instant), 'Jan  5 09:03:07');
});

test('stamp with two digit day', t => {
  const instant = millisToInstant(new Date(2023, 10, 23, 18, 45, 59, 999).getTime());
  t.is(formatStamp(instant), 'Nov 23 18:45:59');
});

test('zero stamp', t => {
  t.is(formatStamp(null), zeroStamp);
  t.is(zeroStamp, 'Jan  1 00:00:00');
});
