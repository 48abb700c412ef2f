import { setTimeout as delay } from "node:timers/promises";

export interface CheckThrottleOptions {
  minIntervalMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const settle = (): void => undefined;

/**
 * Queue for update checks. Checks run one at a time and each one starts at least
 * `minIntervalMs` after the previous one finished, whatever its outcome.
 */
export class CheckThrottle {
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private lastCompletedAt: number | null = null;
  private queueTail: Promise<void> = Promise.resolve();

  constructor(options: CheckThrottleOptions) {
    this.minIntervalMs = Math.max(0, options.minIntervalMs);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  getRemainingDelayMs(): number {
    if (this.lastCompletedAt === null) {
      return 0;
    }

    const elapsed = this.now() - this.lastCompletedAt;
    return Math.max(0, this.minIntervalMs - elapsed);
  }

  schedule<T>(check: () => Promise<T>): Promise<T> {
    const scheduled = this.queueTail.then(async () => {
      const remaining = this.getRemainingDelayMs();
      if (remaining > 0) {
        await this.sleep(remaining);
      }

      try {
        return await check();
      } finally {
        this.lastCompletedAt = this.now();
      }
    });

    // The caller receives the failure through `scheduled`; the queue carries on.
    this.queueTail = scheduled.then(settle, settle);
    return scheduled;
  }
}
