// src/core/clock.ts

import type { SequenceClock } from '../types/ledger';

/** Each reading is one higher than the last, like a block height per call. */
export const createSequenceClock = (start = 1): SequenceClock => {
  let height = start;
  return { now: () => height++ };
};
