import { setTimeout as delay } from "node:timers/promises";

export interface PacerClock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: PacerClock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await delay(ms);
  },
};

export interface RatePacerOptions {
  /** Minimum gap between the start of two consecutive calls. */
  requestDelayMs: number;
  /** Rolling one-minute cap; 0 disables it. */
  requestsPerMinute: number;
}

const WINDOW_MS = 60_000;

export class RatePacer {
  private readonly recent: number[] = [];
  private lastCallAt: number | null = null;

  constructor(
    private readonly options: RatePacerOptions,
    private readonly clock: PacerClock = systemClock,
  ) {}

  /** Milliseconds to wait before the next call may start. */
  waitTime(now = this.clock.now()): number {
    while (this.recent.length > 0 && now - this.recent[0] >= WINDOW_MS) {
      this.recent.shift();
    }

    let wait = 0;
    if (this.lastCallAt !== null) {
      wait = Math.max(wait, this.lastCallAt + this.options.requestDelayMs - now);
    }
    const limit = this.options.requestsPerMinute;
    if (limit > 0 && this.recent.length >= limit) {
      const oldest = this.recent[this.recent.length - limit];
      wait = Math.max(wait, oldest + WINDOW_MS - now);
    }
    return wait;
  }

  /** Resolves once a call is allowed and books it. */
  async acquire(): Promise<number> {
    let waited = 0;
    let wait = this.waitTime();
    while (wait > 0) {
      await this.clock.sleep(wait);
      waited += wait;
      wait = this.waitTime();
    }
    const now = this.clock.now();
    this.lastCallAt = now;
    this.recent.push(now);
    return waited;
  }
}
