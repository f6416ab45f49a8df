export interface Clock {
  /** Current time in epoch milliseconds. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export interface ManualClock extends Clock {
  set(epochMs: number | Date): void;
  advance(ms: number): void;
}

// Tests drive token expiry and registry staleness through this instead of faking timers
export function createManualClock(start: number | Date = Date.now()): ManualClock {
  let current = typeof start === 'number' ? start : start.getTime();

  return {
    now: () => current,
    set(epochMs) {
      current = typeof epochMs === 'number' ? epochMs : epochMs.getTime();
    },
    advance(ms) {
      current += ms;
    },
  };
}

export function toEpochSeconds(epochMs: number): number {
  return Math.floor(epochMs / 1000);
}
