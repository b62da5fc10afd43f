import { Tool } from './index.js';
import { jsonResult } from './utils.js';

export const checkNow: Tool = {
  name: 'check_now',
  description: `Run one quiescence check immediately instead of waiting for the next interval.

A tracked file with no modifications since the previous check is declared finished and handed to the uploader.`,
  inputSchema: {
    type: 'object',
    properties: {},
  },
  handler: async (_args, app) => {
    const result = await app.checkNow();
    return jsonResult(result ?? { status: 'error' });
  },
};
