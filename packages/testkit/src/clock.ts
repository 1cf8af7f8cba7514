/**
 * Hand-driven millisecond clock for time-based tests.
 *
 * Shape-compatible with any `() => number` time source, so it can be passed
 * straight to code that takes a clock function via `clock.now`.
 */
export type ManualClock = Readonly<{
  now: () => number;
  advance: (ms: number) => void;
  set: (ms: number) => void;
}>;

export function createManualClock(startMs = 0): ManualClock {
  let current = startMs;
  return Object.freeze({
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
    set: (ms: number) => {
      current = ms;
    },
  });
}
