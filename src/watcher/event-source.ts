import { watch, FSWatcher } from 'chokidar';
import { stat } from 'node:fs/promises';
import { basename } from 'node:path';
import micromatch from 'micromatch';
import { createLogger, errorMessage, Logger } from '../logger.js';
import { EventSource, RecordingEvent, RecordingEventHandler } from './types.js';

export interface DirectoryEventSourceOptions {
  directory: string;
  include: string[];
  logger?: Logger;
}

export function matchesInclude(filePath: string, include: string[]): boolean {
  return micromatch.isMatch(basename(filePath), include);
}

/**
 * Maps a chokidar event onto a recording event. Directory events and files
 * outside the include patterns map to null.
 */
export function toRecordingEvent(eventName: string, filePath: string, include: string[]): RecordingEvent | null {
  if (!matchesInclude(filePath, include)) {
    return null;
  }

  switch (eventName) {
    case 'add':
      return { path: filePath, kind: 'created' };
    case 'change':
      return { path: filePath, kind: 'modified' };
    default:
      return null;
  }
}

/**
 * Watches the top level of a directory for new and growing files.
 */
export class DirectoryEventSource implements EventSource {
  private watcher: FSWatcher | null = null;
  private readonly log: Logger;

  constructor(private readonly options: DirectoryEventSourceOptions) {
    this.log = options.logger ?? createLogger('watcher');
  }

  async start(handler: RecordingEventHandler): Promise<void> {
    if (this.watcher) return;

    const dirStat = await stat(this.options.directory).catch(() => null);
    if (!dirStat?.isDirectory()) {
      throw new Error(`Watch directory does not exist: ${this.options.directory}`);
    }

    const watcher = watch(this.options.directory, {
      persistent: true,
      ignoreInitial: true,
      depth: 0,
    });

    watcher
      .on('all', (eventName: string, filePath: string) => {
        const event = toRecordingEvent(eventName, filePath, this.options.include);
        if (event) {
          handler(event);
        }
      })
      .on('error', (error: unknown) => {
        this.log('Watcher error:', errorMessage(error));
      });

    this.watcher = watcher;

    await new Promise<void>((resolve) => {
      watcher.once('ready', () => resolve());
    });
    this.log(`Watcher ready on ${this.options.directory}`);
  }

  async stop(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }
  }
}
