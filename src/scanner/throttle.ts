/**
 * Fixed-delay pacing toward the market-data provider. The first call passes straight
 * through; each later call waits until `delayMs` has elapsed since the previous one.
 */

import { setTimeout as sleepMs } from "timers/promises";

export interface Throttle {
  wait(): Promise<void>;
}

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = async (ms) => {
  await sleepMs(ms);
};

export class FixedDelayThrottle implements Throttle {
  private last: number | null = null;

  constructor(
    private readonly delayMs: number,
    private readonly sleep: Sleep = defaultSleep,
    private readonly now: () => number = Date.now
  ) {
    if (!Number.isFinite(delayMs) || delayMs < 0) {
      throw new Error(`Throttle delay must be a non-negative number, got ${delayMs}`);
    }
  }

  async wait(): Promise<void> {
    if (this.last !== null && this.delayMs > 0) {
      const remaining = this.last + this.delayMs - this.now();
      if (remaining > 0) await this.sleep(remaining);
    }
    this.last = this.now();
  }
}

/** No pacing at all, for tests and offline providers. */
export const noThrottle: Throttle = {
  wait: async () => {},
};
