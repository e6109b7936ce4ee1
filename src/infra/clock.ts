/**
 * Timestamp source shared by version trees and the recency index.
 * Timestamps are epoch milliseconds.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Clock that only moves when told to. Used by tests and scripted runs.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }

  advance(ms = 1): number {
    this.current += ms;
    return this.current;
  }
}

/**
 * Render a timestamp as UTC `YYYY-MM-DD HH:MM:SS`
 */
export function formatTimestamp(timestamp: number): string {
  return new Date(timestamp).toISOString().replace("T", " ").slice(0, 19);
}
