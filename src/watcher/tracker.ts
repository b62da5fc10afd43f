import { createLogger, errorMessage, Logger } from '../logger.js';
import { Mutex } from './mutex.js';
import { CheckResult, CompletionCallback, TrackedFile, TrackerStats } from './types.js';

export interface QuiescenceTrackerOptions {
  checkIntervalMs: number;
  onFinished: CompletionCallback;
  logger?: Logger;
  now?: () => number;
}

const seconds = (ms: number) => (ms / 1000).toFixed(1);

/**
 * Decides when a recording has stopped being written. A file counts as
 * finished once a whole check interval passes with no modify event for it.
 *
 * All state lives in `tracked` and is only touched inside `mutex`. The
 * completion callback runs after the lock is released. Whether a write
 * landed since the last check is kept as a flag, not read off the clock:
 * two events can share a millisecond and wall time can step backwards.
 */
export class QuiescenceTracker {
  private tracked: TrackedFile | null = null;
  private modifiedSinceCheck = false;
  private readonly mutex = new Mutex();
  private readonly counters: TrackerStats = { created: 0, finished: 0, abandoned: 0 };
  private readonly checkIntervalMs: number;
  private readonly onFinished: CompletionCallback;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(options: QuiescenceTrackerOptions) {
    this.checkIntervalMs = options.checkIntervalMs;
    this.onFinished = options.onFinished;
    this.log = options.logger ?? createLogger('tracker');
    this.now = options.now ?? (() => Date.now());
  }

  get stats(): TrackerStats {
    return { ...this.counters };
  }

  async onCreate(path: string): Promise<void> {
    this.log(`Recording started: ${path}`);

    await this.mutex.runExclusive(() => {
      if (this.tracked) {
        this.log(`Warning: Already tracking ${this.tracked.path}, switching to ${path}`);
        this.log(`Abandoned ${this.tracked.path} before it finished`);
        this.counters.abandoned++;
      }

      const now = this.now();
      this.tracked = { path, lastModifiedAt: now, lastCheckedAt: now };
      this.modifiedSinceCheck = false;
      this.counters.created++;
      this.log(`Tracking file. Will check in ${seconds(this.checkIntervalMs)} seconds if recording is finished.`);
    });
  }

  async onModify(path: string): Promise<void> {
    await this.mutex.runExclusive(() => {
      if (this.tracked?.path === path) {
        this.tracked.lastModifiedAt = this.now();
        this.modifiedSinceCheck = true;
      }
    });
  }

  async check(): Promise<CheckResult> {
    const result = await this.mutex.runExclusive((): CheckResult => {
      if (!this.tracked) {
        return { status: 'idle' };
      }

      const { path, lastModifiedAt } = this.tracked;
      const now = this.now();
      const elapsedMs = Math.max(0, now - lastModifiedAt);

      if (this.modifiedSinceCheck) {
        this.tracked.lastCheckedAt = now;
        this.modifiedSinceCheck = false;
        this.log(`File still being written: ${path}`);
        this.log(
          `  Last modified: ${seconds(elapsedMs)}s ago, will check again in ${seconds(this.checkIntervalMs)} seconds`,
        );
        return { status: 'writing', path, elapsedMs };
      }

      this.tracked = null;
      this.counters.finished++;
      this.log(`File finished! No modifications for ${seconds(elapsedMs)}s`);
      return { status: 'finished', path, elapsedMs };
    });

    if (result.status === 'finished') {
      await this.complete(result.path);
    }

    return result;
  }

  async snapshot(): Promise<TrackedFile | null> {
    return this.mutex.runExclusive(() => (this.tracked ? { ...this.tracked } : null));
  }

  private async complete(path: string): Promise<void> {
    try {
      await this.onFinished(path);
    } catch (error) {
      this.log(`Completion handler failed for ${path}:`, errorMessage(error));
    }
  }
}
