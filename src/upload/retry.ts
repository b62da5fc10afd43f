import { createLogger, errorMessage, Logger } from '../logger.js';
import { httpStatusOf, isRetriable as defaultIsRetriable } from './errors.js';

export interface RetryOptions {
  maxRetries: number;
  isRetriable?: (error: unknown) => boolean;
  logger?: Logger;
}

/**
 * Runs `operation` up to `maxRetries + 1` times. Errors the predicate rejects
 * are rethrown on the spot; the last error is rethrown once retries run out.
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const isRetriable = options.isRetriable ?? defaultIsRetriable;
  const log = options.logger ?? createLogger('uploader');

  for (let retry = 0; ; retry++) {
    try {
      return await operation(retry + 1);
    } catch (error) {
      if (!isRetriable(error)) {
        throw error;
      }

      const status = httpStatusOf(error);
      log(
        status !== undefined
          ? `A retriable HTTP error ${status} occurred: ${errorMessage(error)}`
          : `A retriable error occurred: ${errorMessage(error)}`,
      );

      if (retry >= options.maxRetries) {
        log('Max retries exceeded');
        throw error;
      }

      log(`Retrying upload... (attempt ${retry + 1})`);
    }
  }
}
