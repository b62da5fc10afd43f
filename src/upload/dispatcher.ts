import { PrivacyStatus } from '../config.js';
import { createLogger, errorMessage, Logger } from '../logger.js';
import { DispatchOutcome, Uploader } from './types.js';

export interface UploadDefaults {
  privacyStatus: PrivacyStatus;
  categoryId: string;
  tags: string[];
}

export interface CompletionDispatcherOptions {
  uploader?: Uploader | null;
  defaults?: Partial<UploadDefaults>;
  logger?: Logger;
  now?: () => Date;
}

const DEFAULT_UPLOAD: UploadDefaults = {
  privacyStatus: 'private',
  categoryId: '22',
  tags: [],
};

/** MM/DD/YYYY in local time. */
export function formatTitle(date: Date): string {
  const mm = String(date.getMonth() + 1).padStart(2, '0');
  const dd = String(date.getDate()).padStart(2, '0');
  return `${mm}/${dd}/${date.getFullYear()}`;
}

/**
 * Turns a finished recording into an upload. Never throws; retries are the
 * uploader's business.
 */
export class CompletionDispatcher {
  private uploader: Uploader | null;
  private lastOutcome: DispatchOutcome | null = null;
  private readonly defaults: UploadDefaults;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(options: CompletionDispatcherOptions = {}) {
    this.uploader = options.uploader ?? null;
    this.defaults = { ...DEFAULT_UPLOAD, ...options.defaults };
    this.log = options.logger ?? createLogger('dispatcher');
    this.now = options.now ?? (() => new Date());
  }

  get lastResult(): DispatchOutcome | null {
    return this.lastOutcome;
  }

  hasUploader(): boolean {
    return this.uploader !== null;
  }

  setUploader(uploader: Uploader | null): void {
    this.uploader = uploader;
  }

  async dispatch(path: string): Promise<DispatchOutcome> {
    this.log(`Recording finished: ${path}`);

    if (!this.uploader) {
      this.log('No uploader configured, skipping upload');
      return this.record({ path, status: 'skipped' });
    }

    const date = this.now();
    const title = formatTitle(date);

    this.log('Starting upload to YouTube...');
    try {
      const result = await this.uploader.uploadVideo({
        videoPath: path,
        title,
        description: `Auto-uploaded recording: ${title}`,
        categoryId: this.defaults.categoryId,
        privacyStatus: this.defaults.privacyStatus,
        tags: [...this.defaults.tags],
      });

      if (result.ok) {
        this.log(`Successfully uploaded video: ${result.videoId}`);
        return this.record({ path, status: 'uploaded', videoId: result.videoId });
      }

      this.log(`Failed to upload video: ${result.error}`);
      return this.record({ path, status: 'failed', error: result.error });
    } catch (error) {
      this.log(`Failed to upload video: ${errorMessage(error)}`);
      return this.record({ path, status: 'failed', error: errorMessage(error) });
    }
  }

  private record(outcome: Omit<DispatchOutcome, 'at'>): DispatchOutcome {
    this.lastOutcome = { ...outcome, at: this.now().toISOString() };
    return this.lastOutcome;
  }
}
