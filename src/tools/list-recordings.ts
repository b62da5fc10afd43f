import { z } from 'zod';
import { Tool } from './index.js';
import { jsonResult } from './utils.js';

const argsSchema = z.object({
  limit: z.number().int().positive().optional(),
});

export const listRecordings: Tool = {
  name: 'list_recordings',
  description: 'List recordings in the watch directory, newest first, with size and modification time.',
  inputSchema: {
    type: 'object',
    properties: {
      limit: { type: 'number', description: 'Maximum number of recordings to return' },
    },
  },
  handler: async (args, app) => {
    const { limit } = argsSchema.parse(args ?? {});
    const recordings = await app.listRecordings(limit);

    return jsonResult({
      directory: app.config.watcher.directory,
      total: recordings.length,
      recordings,
    });
  },
};
