/**
 * Default time sources
 */

import type { Clock, SleepFn } from '../core/interfaces/clock.js';

export const systemClock: Clock = {
  now: () => Date.now(),
};

export const sleep: SleepFn = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
