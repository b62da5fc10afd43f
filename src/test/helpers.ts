import { Config } from '../config.js';
import { EventSource, RecordingEvent, RecordingEventHandler } from '../watcher/types.js';

/** Stands in for chokidar; tests push events through `emit`. */
export class FakeEventSource implements EventSource {
  private handler: RecordingEventHandler | null = null;
  started = false;

  async start(handler: RecordingEventHandler): Promise<void> {
    this.handler = handler;
    this.started = true;
  }

  async stop(): Promise<void> {
    this.handler = null;
    this.started = false;
  }

  emit(event: RecordingEvent): void {
    this.handler?.(event);
  }
}

export function testConfig(directory: string, overrides: Partial<Config['upload']> = {}): Config {
  return {
    watcher: {
      directory,
      checkIntervalSeconds: 300,
      include: ['*.mp4'],
    },
    upload: {
      enabled: true,
      tokenFile: 'token.json',
      privacyStatus: 'private',
      categoryId: '22',
      tags: [],
      maxRetries: 3,
      ...overrides,
    },
  };
}
