/**
 * Deterministic clocks for indexing tests
 */

import type { Clock } from "@searchmap/sdk";

export interface ManualClock {
  /** Clock function to pass as the `clock` option */
  readonly now: Clock;
  /** Move time forward */
  advance(ms: number): void;
}

/**
 * Create a clock that only moves when told to, or by `stepMs` on every read
 * @param start - Initial time
 * @param stepMs - Milliseconds added after each read (default: 0)
 */
export function createManualClock(start: Date | string, stepMs = 0): ManualClock {
  let current = new Date(start).getTime();

  return {
    now: () => {
      const value = new Date(current);
      current += stepMs;
      return value;
    },
    advance(ms) {
      current += ms;
    },
  };
}
