import { Tool } from './index.js';
import { jsonResult } from './utils.js';

export const getStatus: Tool = {
  name: 'get_status',
  description: `Report what recwatch is doing right now.

Returns the watch directory, the check interval, the recording currently being tracked (with its last modification and last check times), tracker counters and the outcome of the most recent upload.`,
  inputSchema: {
    type: 'object',
    properties: {},
  },
  handler: async (_args, app) => jsonResult(await app.status()),
};
