import { isAbsolute, relative, resolve, sep } from 'node:path';
import { z } from 'zod';
import { Tool } from './index.js';
import { jsonResult } from './utils.js';

const argsSchema = z.object({
  path: z.string().min(1),
});

export const uploadRecording: Tool = {
  name: 'upload_recording',
  description: `Upload a recording right away, bypassing the quiescence check.

WHEN TO USE: an automatic upload failed, or the file was finished before recwatch started. Relative paths resolve against the watch directory; files outside it are refused.`,
  inputSchema: {
    type: 'object',
    properties: {
      path: { type: 'string', description: 'Path of the video file' },
    },
    required: ['path'],
  },
  handler: async (args, app) => {
    const { path } = argsSchema.parse(args ?? {});
    const directory = resolve(app.config.watcher.directory);
    const videoPath = resolve(directory, path);
    const fromWatchDir = relative(directory, videoPath);

    if (!fromWatchDir || fromWatchDir === '..' || fromWatchDir.startsWith(`..${sep}`) || isAbsolute(fromWatchDir)) {
      throw new Error(`Path is outside the watch directory: ${videoPath}`);
    }

    return jsonResult(await app.uploadNow(videoPath));
  },
};
