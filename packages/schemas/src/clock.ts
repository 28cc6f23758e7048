/**
 * Single time source for the core. Expiry sweeps, appeal windows,
 * aggregation windows and audit timestamps all read from a Clock so
 * tests can drive time explicitly.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export class ManualClock implements Clock {
  private current: number;

  constructor(start: number | string = 0) {
    this.current = typeof start === "string" ? Date.parse(start) : start;
    if (!Number.isFinite(this.current)) {
      throw new Error(`Invalid clock start: "${String(start)}"`);
    }
  }

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}

export function isoAt(clock: Clock): string {
  return new Date(clock.now()).toISOString();
}

export const DAY_MS = 86_400_000;
