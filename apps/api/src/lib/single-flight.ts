export type SingleFlightResult<T> = { skipped: true } | { skipped: false; value: T };

/**
 * Runs at most one task at a time. A call made while a task is in flight
 * is skipped, not queued.
 */
export class SingleFlight {
  private inFlight = false;

  get running(): boolean {
    return this.inFlight;
  }

  async run<T>(task: () => Promise<T>): Promise<SingleFlightResult<T>> {
    if (this.inFlight) return { skipped: true };
    this.inFlight = true;
    try {
      return { skipped: false, value: await task() };
    } finally {
      this.inFlight = false;
    }
  }
}
