import type { AlertLifecyclePort, ClockPort, SweepStats } from '@fleet-alerts/domain';
import { SingleFlight } from '../lib/single-flight.js';

export interface SweepRun {
  startedAt: Date;
  finishedAt: Date;
  stats: SweepStats | null;
  error?: string;
}

export type TriggerResult = { status: 'completed'; run: SweepRun } | { status: 'skipped' };

/**
 * Runs the auto-close sweep on a fixed interval. Timer ticks and manual
 * triggers share one guard, so overlapping runs are skipped. The guard is
 * per process; several schedulers against one database are not coordinated.
 */
export class AutoCloseScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private readonly guard = new SingleFlight();
  private last: SweepRun | null = null;

  constructor(
    private readonly lifecycle: AlertLifecyclePort,
    private readonly clock: ClockPort,
    private readonly intervalMs: number,
  ) {}

  get running(): boolean {
    return this.guard.running;
  }

  get lastRun(): SweepRun | null {
    return this.last;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      void this.trigger();
    }, this.intervalMs);
    console.log(`[auto-close] scheduled every ${Math.round(this.intervalMs / 1000)}s`);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** A failed pass is recorded and logged; retry is the next tick. */
  async trigger(): Promise<TriggerResult> {
    const result = await this.guard.run(async (): Promise<SweepRun> => {
      const startedAt = this.clock.now();
      try {
        const stats = await this.lifecycle.sweepAutoClose();
        return { startedAt, finishedAt: this.clock.now(), stats };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error('[auto-close] sweep aborted', message);
        return { startedAt, finishedAt: this.clock.now(), stats: null, error: message };
      }
    });

    if (result.skipped) {
      console.warn('[auto-close] previous sweep still running; tick skipped');
      return { status: 'skipped' };
    }
    this.last = result.value;
    return { status: 'completed', run: result.value };
  }
}
