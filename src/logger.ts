export type Logger = (...args: unknown[]) => void;

/**
 * Logs to stderr so stdout stays free for the MCP stdio transport.
 */
export function createLogger(prefix: string): Logger {
  return (...args: unknown[]) => {
    console.error(`[${prefix}]`, ...args);
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
