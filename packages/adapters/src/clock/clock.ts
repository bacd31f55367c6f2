import type { ClockPort } from '@fleet-alerts/domain';

/** Wall-clock implementation for live mode. */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }
}

/**
 * Clock that only moves when told to.
 * Used by tests and local simulations of the sweep schedule.
 */
export class ManualClock implements ClockPort {
  private currentMs: number;

  constructor(epochMs: number) {
    this.currentMs = epochMs;
  }

  now(): Date {
    return new Date(this.currentMs);
  }

  set(at: Date): void {
    this.currentMs = at.getTime();
  }

  advance(ms: number): void {
    this.currentMs += ms;
  }

  advanceMinutes(minutes: number): void {
    this.advance(minutes * 60_000);
  }
}
