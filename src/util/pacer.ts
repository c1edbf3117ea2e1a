import { sleep as defaultSleep } from "./sleep.js";
import type { Logger } from "./logger.js";

export interface PacerOptions {
  minIntervalMs: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/**
 * Spaces out successive requests to the same remote service.
 * The first call never waits.
 */
export class Pacer {
  private readonly minIntervalMs: number;
  private readonly logger?: Logger;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private lastRequestTime: number | null = null;

  constructor(options: PacerOptions) {
    this.minIntervalMs = Math.max(0, options.minIntervalMs);
    this.logger = options.logger;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async wait(): Promise<void> {
    if (this.lastRequestTime !== null) {
      const elapsed = this.now() - this.lastRequestTime;
      const waitTime = this.minIntervalMs - elapsed;
      if (waitTime > 0) {
        this.logger?.debug({ waitTime }, "Pacing request");
        await this.sleep(waitTime);
      }
    }
    this.lastRequestTime = this.now();
  }
}
