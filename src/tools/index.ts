import type { RecWatchApp } from '../app.js';
import { checkNow } from './check-now.js';
import { getStatus } from './get-status.js';
import { listRecordings } from './list-recordings.js';
import { uploadRecording } from './upload-recording.js';
import type { ToolResult } from './utils.js';

export interface Tool {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, object>;
    required?: string[];
  };
  handler: (args: unknown, app: RecWatchApp) => Promise<ToolResult>;
}

export const tools: Tool[] = [getStatus, listRecordings, checkNow, uploadRecording];

export { getStatus, listRecordings, checkNow, uploadRecording };
