export type RecordingEventKind = 'created' | 'modified';

export interface RecordingEvent {
  path: string;
  kind: RecordingEventKind;
}

export type RecordingEventHandler = (event: RecordingEvent) => void;

export interface EventSource {
  start(handler: RecordingEventHandler): Promise<void>;
  stop(): Promise<void>;
}

/** The one file being watched for quiescence. Timestamps are epoch ms. */
export interface TrackedFile {
  path: string;
  lastModifiedAt: number;
  lastCheckedAt: number;
}

export type CheckResult =
  | { status: 'idle' }
  | { status: 'writing'; path: string; elapsedMs: number }
  | { status: 'finished'; path: string; elapsedMs: number };

export interface TrackerStats {
  created: number;
  finished: number;
  abandoned: number;
}

export type CompletionCallback = (path: string) => void | Promise<void>;
