import { ZodError } from 'zod';
import { errorMessage } from '../logger.js';

export type TextContent = { type: 'text'; text: string };

export type ToolResult = {
  content: TextContent[];
  isError?: boolean;
};

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}

export function jsonResult(value: unknown): ToolResult {
  return textResult(JSON.stringify(value, null, 2));
}

export function errorResult(error: unknown): ToolResult {
  const message =
    error instanceof ZodError
      ? error.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`).join('; ')
      : errorMessage(error);

  return { content: [{ type: 'text', text: `Error: ${message}` }], isError: true };
}
