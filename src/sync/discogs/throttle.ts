export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Enforces a minimum wall-clock gap between consecutive requests.
 * State lives on the instance: one throttle per client, never shared.
 */
export class RequestThrottle {
  private lastRequestAt: number | null = null;

  constructor(
    readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock,
  ) {}

  /** Block until the next request is allowed, then claim the slot. */
  async wait(): Promise<void> {
    if (this.lastRequestAt !== null) {
      const elapsed = this.clock.now() - this.lastRequestAt;
      if (elapsed < this.minIntervalMs) {
        await this.clock.sleep(this.minIntervalMs - elapsed);
      }
    }
    this.lastRequestAt = this.clock.now();
  }
}
