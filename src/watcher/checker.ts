import { createLogger, errorMessage, Logger } from '../logger.js';
import { CheckResult } from './types.js';

export interface Checkable {
  check(): Promise<CheckResult>;
}

export interface PeriodicCheckerOptions {
  intervalMs: number;
  logger?: Logger;
}

/**
 * Calls `tracker.check()` every `intervalMs` until stopped. A failing check
 * is logged and the loop carries on.
 */
export class PeriodicChecker {
  private running = false;
  private generation = 0;
  private loopDone: Promise<void> | null = null;
  private sleepTimer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;
  private readonly intervalMs: number;
  private readonly log: Logger;

  constructor(
    private readonly tracker: Checkable,
    options: PeriodicCheckerOptions,
  ) {
    this.intervalMs = options.intervalMs;
    this.log = options.logger ?? createLogger('checker');
  }

  isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;

    this.running = true;
    this.loopDone = this.loop(++this.generation);
  }

  /**
   * Cuts the current sleep short and waits for the loop to exit. A check
   * already in flight is allowed to finish.
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    this.generation++;
    this.wake?.();
    const done = this.loopDone;
    await done;
    // start() may have been called while we waited.
    if (this.loopDone === done) {
      this.loopDone = null;
    }
  }

  async checkNow(): Promise<CheckResult | null> {
    try {
      return await this.tracker.check();
    } catch (error) {
      this.log('Quiescence check failed:', errorMessage(error));
      return null;
    }
  }

  private async loop(generation: number): Promise<void> {
    const current = () => this.running && this.generation === generation;

    while (current()) {
      await this.sleep(this.intervalMs);
      if (!current()) break;
      await this.checkNow();
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const done = () => {
        if (this.sleepTimer) {
          clearTimeout(this.sleepTimer);
          this.sleepTimer = null;
        }
        this.wake = null;
        resolve();
      };
      this.wake = done;
      this.sleepTimer = setTimeout(done, ms);
    });
  }
}
