import { errorMessage } from '../logger.js';

export const RETRIABLE_STATUS_CODES: readonly number[] = [500, 502, 503, 504];

export class UploadError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'UploadError';
  }
}

/**
 * Reads the HTTP status off a googleapis (gaxios) error, which carries it on
 * `response.status` and, in newer releases, on `status` as well.
 */
export function httpStatusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }

  if (
    'response' in error &&
    typeof error.response === 'object' &&
    error.response !== null &&
    'status' in error.response &&
    typeof error.response.status === 'number'
  ) {
    return error.response.status;
  }

  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }

  return undefined;
}

export function toUploadError(error: unknown): UploadError {
  if (error instanceof UploadError) {
    return error;
  }
  return new UploadError(errorMessage(error), httpStatusOf(error));
}

/** Server-side failures and failures that never got an HTTP response are worth another attempt. */
export function isRetriable(error: unknown): boolean {
  const status = httpStatusOf(error);
  if (status === undefined) {
    return true;
  }
  return RETRIABLE_STATUS_CODES.includes(status);
}
