import { Clock } from '../types';

/** A clock that only moves when told to. */
export class ManualClock implements Clock {
  private current: number;

  constructor(start = 1_700_000_000) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  set(timestamp: number): void {
    if (timestamp < this.current) {
      throw new RangeError(`Clock cannot move backwards (${timestamp} < ${this.current})`);
    }
    this.current = timestamp;
  }

  advance(seconds: number): number {
    this.set(this.current + seconds);
    return this.current;
  }
}
