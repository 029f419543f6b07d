import test from 'ava';
import { sleepMs } from './sleep.js';
import { maxTimerDelayMillis, Timeout } from './timeout.js';

test('runs the callback once', async t => {
  let calls = 0;
  const timeout = Timeout.create(() => {
    calls++;
  }, 5);
  t.true(timeout.isActive);
  t.true(timeout.isRefed);

  t.true(await timeout.promise);
  t.is(calls, 1);
  t.false(timeout.isActive);
  t.false(timeout.isCleared);
});

test('clear prevents the callback', async t => {
  let calls = 0;
  const timeout = Timeout.create(() => {
    calls++;
  }, 5);
  timeout.clear();

  t.false(await timeout.promise);
  t.is(calls, 0);
  t.true(timeout.isCleared);
});

test('clear after firing keeps the result', async t => {
  const timeout = Timeout.create(() => {
    // Nothing
  }, 1);
  await timeout.promise;
  timeout.clear();

  t.true(await timeout.promise);
  t.false(timeout.isCleared);
});

test('cleared instance', async t => {
  const timeout = Timeout.cleared();
  t.true(timeout.isCleared);
  t.false(timeout.isActive);
  t.false(await timeout.promise);
});

test('delay beyond the timer limit does not fire early', async t => {
  let calls = 0;
  const timeout = Timeout.create(
    () => {
      calls++;
    },
    maxTimerDelayMillis + 1000,
    { unref: true }
  );

  await sleepMs(50);
  t.is(calls, 0);
  t.true(timeout.isActive);
  t.false(timeout.isRefed);

  timeout.clear();
  t.false(await timeout.promise);
});

test('negative delay fires right away', async t => {
  let calls = 0;
  const timeout = Timeout.create(() => {
    calls++;
  }, -5);

  t.true(await timeout.promise);
  t.is(calls, 1);
});
