/** Timestamp source. Values only ever move forward. */
export interface Clock {
  now(): number;
}

/** Wall-clock milliseconds, held monotonic across system clock steps. */
export function systemClock(): Clock {
  let last = 0;
  return {
    now() {
      last = Math.max(last, Date.now());
      return last;
    },
  };
}

export interface SequenceClock extends Clock {
  advance(by?: number): number;
}

/**
 * A block-height style counter. Reads do not move it; callers advance it
 * between operations when they want distinct stamps.
 */
export function sequenceClock(start = 1): SequenceClock {
  let height = start;
  return {
    now: () => height,
    advance(by = 1) {
      if (!Number.isSafeInteger(by) || by < 0) throw new RangeError(`Cannot advance clock by ${by}`);
      height += by;
      return height;
    },
  };
}
