export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Spaces successive calls to `wait()` at least `intervalMs` apart. Slots are
 * reserved synchronously, so concurrent workers share one schedule.
 */
export class Pacer {
  private readonly intervalMs: number;
  private readonly now: () => number;
  private readonly pause: (ms: number) => Promise<void>;
  private nextSlot = 0;

  constructor(intervalMs: number, now: () => number = Date.now, pause: (ms: number) => Promise<void> = sleep) {
    this.intervalMs = intervalMs;
    this.now = now;
    this.pause = pause;
  }

  static perMinute(requestsPerMinute: number): Pacer {
    return new Pacer(Math.ceil(60_000 / Math.max(1, requestsPerMinute)));
  }

  async wait(): Promise<void> {
    if (this.intervalMs <= 0) {
      return;
    }
    const current = this.now();
    const slot = Math.max(current, this.nextSlot);
    this.nextSlot = slot + this.intervalMs;
    if (slot > current) {
      await this.pause(slot - current);
    }
  }
}
