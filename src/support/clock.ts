import { MILLISECOND } from './duration.js';
import { Instant } from './timestamp.js';

export interface Clock {
  now(): Instant;
}

// The wall clock is read once; later readings advance with the monotonic
// high resolution timer.
const wallAnchor = BigInt(Date.now()) * MILLISECOND;
const hrAnchor = process.hrtime.bigint();

export const systemClock: Clock = {
  now() {
    return wallAnchor + (process.hrtime.bigint() - hrAnchor);
  },
};
