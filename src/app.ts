import fastGlob from 'fast-glob';
const { glob } = fastGlob;
import { Config } from './config.js';
import { createLogger, errorMessage, Logger } from './logger.js';
import { CompletionDispatcher } from './upload/dispatcher.js';
import { DispatchOutcome, Uploader } from './upload/types.js';
import { YouTubeUploader } from './upload/youtube.js';
import { PeriodicChecker } from './watcher/checker.js';
import { DirectoryEventSource } from './watcher/event-source.js';
import { QuiescenceTracker } from './watcher/tracker.js';
import { CheckResult, EventSource, RecordingEvent, TrackedFile, TrackerStats } from './watcher/types.js';

export interface AuthenticatingUploader extends Uploader {
  authenticate(): Promise<boolean>;
}

export interface RecWatchAppOptions {
  config: Config;
  eventSource?: EventSource;
  /** Used instead of a YouTubeUploader when uploads are enabled. */
  uploader?: AuthenticatingUploader;
  logger?: Logger;
  now?: () => number;
}

export interface RecordingInfo {
  path: string;
  size: number;
  modifiedAt: string;
}

export interface AppStatus {
  watchDirectory: string;
  checkIntervalMs: number;
  checkerRunning: boolean;
  uploaderConfigured: boolean;
  tracked: TrackedFile | null;
  stats: TrackerStats;
  lastUpload: DispatchOutcome | null;
}

/**
 * Wires the directory watcher, quiescence tracker, periodic checker and
 * upload dispatcher together for one watch directory.
 */
export class RecWatchApp {
  readonly tracker: QuiescenceTracker;
  readonly checker: PeriodicChecker;
  readonly dispatcher: CompletionDispatcher;
  private readonly eventSource: EventSource;
  private readonly uploader: AuthenticatingUploader | null;
  private readonly log: Logger;
  private started = false;

  constructor(private readonly options: RecWatchAppOptions) {
    const { config } = options;
    this.log = options.logger ?? createLogger('recwatch');

    const checkIntervalMs = config.watcher.checkIntervalSeconds * 1000;

    this.dispatcher = new CompletionDispatcher({
      defaults: {
        privacyStatus: config.upload.privacyStatus,
        categoryId: config.upload.categoryId,
        tags: config.upload.tags,
      },
      logger: options.logger,
    });

    this.tracker = new QuiescenceTracker({
      checkIntervalMs,
      onFinished: async (path) => {
        await this.dispatcher.dispatch(path);
      },
      logger: options.logger,
      now: options.now,
    });

    this.checker = new PeriodicChecker(this.tracker, {
      intervalMs: checkIntervalMs,
      logger: options.logger,
    });

    this.eventSource =
      options.eventSource ??
      new DirectoryEventSource({
        directory: config.watcher.directory,
        include: config.watcher.include,
        logger: options.logger,
      });

    this.uploader = config.upload.enabled
      ? options.uploader ??
        new YouTubeUploader({
          tokenFile: config.upload.tokenFile,
          maxRetries: config.upload.maxRetries,
          logger: options.logger,
        })
      : null;
  }

  get config(): Config {
    return this.options.config;
  }

  async start(): Promise<void> {
    if (this.started) return;

    this.log('Starting recwatch...');
    this.log(`Watching directory: ${this.config.watcher.directory}`);

    if (this.uploader) {
      if (await this.uploader.authenticate()) {
        this.dispatcher.setUploader(this.uploader);
      } else {
        this.log('YouTube authentication failed; running in detector-only mode');
      }
    } else {
      this.log('Uploads disabled; running in detector-only mode');
    }

    await this.eventSource.start((event) => this.handleEvent(event));
    this.checker.start();
    this.started = true;
    this.log('File watcher started.');
  }

  async stop(): Promise<void> {
    if (!this.started) return;

    this.log('Stopping recwatch...');
    await this.eventSource.stop();
    await this.checker.stop();
    this.started = false;
    this.log('Stopped.');
  }

  async status(): Promise<AppStatus> {
    return {
      watchDirectory: this.config.watcher.directory,
      checkIntervalMs: this.config.watcher.checkIntervalSeconds * 1000,
      checkerRunning: this.checker.isRunning(),
      uploaderConfigured: this.dispatcher.hasUploader(),
      tracked: await this.tracker.snapshot(),
      stats: this.tracker.stats,
      lastUpload: this.dispatcher.lastResult,
    };
  }

  checkNow(): Promise<CheckResult | null> {
    return this.checker.checkNow();
  }

  uploadNow(path: string): Promise<DispatchOutcome> {
    return this.dispatcher.dispatch(path);
  }

  /** Files in the watch directory matching the include patterns, newest first. */
  async listRecordings(limit?: number): Promise<RecordingInfo[]> {
    const entries = await glob(this.config.watcher.include, {
      cwd: this.config.watcher.directory,
      absolute: true,
      onlyFiles: true,
      deep: 1,
      stats: true,
    });

    const recordings = entries
      .flatMap((entry) => (entry.stats ? [{ path: entry.path, stats: entry.stats }] : []))
      .sort((a, b) => b.stats.mtimeMs - a.stats.mtimeMs)
      .map(({ path, stats }) => ({
        path,
        size: stats.size,
        modifiedAt: stats.mtime.toISOString(),
      }));

    return limit !== undefined ? recordings.slice(0, limit) : recordings;
  }

  private handleEvent(event: RecordingEvent): void {
    const pending = event.kind === 'created' ? this.tracker.onCreate(event.path) : this.tracker.onModify(event.path);
    pending.catch((error) => this.log(`Failed to handle ${event.kind} event for ${event.path}:`, errorMessage(error)));
  }
}
