import type { Clock } from '@provrec/record';

/**
 * Wall-clock time source.
 */
export const systemClock: Clock = {
  nowMs: () => Date.now(),
};

/**
 * Clock that only moves when told to.
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(startMs = 0) {
    this.current = startMs;
  }

  nowMs(): number {
    return this.current;
  }

  set(ms: number): void {
    this.current = ms;
  }

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }
}
