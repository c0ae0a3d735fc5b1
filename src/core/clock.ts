/**
 * Logical clocks. The registry never reads wall time; it asks a LogicalClock.
 */

import type { LogicalClock, LogicalTimestamp } from './types.js';

/** Clock driven by the caller, e.g. advanced once per imported block. */
export class ManualClock implements LogicalClock {
  private current: LogicalTimestamp;

  constructor(start: LogicalTimestamp = 0) {
    assertTimestamp(start);
    this.current = start;
  }

  now(): LogicalTimestamp {
    return this.current;
  }

  advance(by = 1): LogicalTimestamp {
    assertTimestamp(by);
    this.current += by;
    return this.current;
  }

  set(timestamp: LogicalTimestamp): void {
    assertTimestamp(timestamp);
    if (timestamp < this.current) {
      throw new Error(`Clock cannot move backwards: ${timestamp} < ${this.current}`);
    }
    this.current = timestamp;
  }
}

/** Wrap a clock so that a reading smaller than an earlier one throws. */
export function monotonicClock(source: LogicalClock): LogicalClock {
  let last: LogicalTimestamp | null = null;
  return {
    now(): LogicalTimestamp {
      const t = source.now();
      assertTimestamp(t);
      if (last !== null && t < last) {
        throw new Error(`Logical clock went backwards: ${t} < ${last}`);
      }
      last = t;
      return t;
    },
  };
}

function assertTimestamp(t: number): void {
  if (!Number.isSafeInteger(t) || t < 0) {
    throw new RangeError(`Invalid logical timestamp: ${t}`);
  }
}
