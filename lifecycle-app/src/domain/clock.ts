export interface Clock {
  now(): Date;
}

export const systemClock: Clock = { now: () => new Date() };

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export interface ManualClock extends Clock {
  set(instant: Date): void;
  advanceDays(days: number): void;
}

/** Clock that only moves when told to; for tests and replays. */
export function manualClock(start: Date): ManualClock {
  let current = new Date(start.getTime());
  return {
    now: () => new Date(current.getTime()),
    set(instant) {
      current = new Date(instant.getTime());
    },
    advanceDays(days) {
      current = new Date(current.getTime() + days * MS_PER_DAY);
    },
  };
}
