/**
 * Failures an image fetch can report to its callers.
 */

export type ImageCacheErrorCode = "NETWORK_ERROR" | "DECODE_ERROR" | "CANCELLED";

export class ImageCacheError extends Error {
  code: ImageCacheErrorCode;
  locator: string;
  retryable: boolean;

  constructor(
    message: string,
    code: ImageCacheErrorCode,
    locator: string,
    retryable: boolean = false,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "ImageCacheError";
    this.code = code;
    this.locator = locator;
    this.retryable = retryable;
  }
}

export interface NetworkErrorOptions {
  status?: number;
  cause?: unknown;
}

/**
 * Transport failure or non-success response. Without a status the request
 * never got an answer and is worth retrying.
 */
export class NetworkError extends ImageCacheError {
  status?: number;

  constructor(locator: string, message: string, options: NetworkErrorOptions = {}) {
    super(message, "NETWORK_ERROR", locator, isRetryableStatus(options.status), options.cause);
    this.name = "NetworkError";
    this.status = options.status;
  }

  isServerError(): boolean {
    return this.status !== undefined && this.status >= 500;
  }

  isRateLimitError(): boolean {
    return this.status === 429;
  }
}

/** Bytes arrived but are not an image. */
export class DecodeError extends ImageCacheError {
  constructor(locator: string, message: string, cause?: unknown) {
    super(message, "DECODE_ERROR", locator, false, cause);
    this.name = "DecodeError";
  }
}

/** The caller gave up before the bytes arrived. */
export class CancelledError extends ImageCacheError {
  constructor(locator: string, message: string = "Image request was cancelled") {
    super(message, "CANCELLED", locator);
    this.name = "CancelledError";
  }
}

export function isRetryableStatus(status: number | undefined): boolean {
  if (status === undefined) return true;
  return status === 408 || status === 429 || status >= 500;
}

export function isImageCacheError(error: unknown): error is ImageCacheError {
  return error instanceof ImageCacheError;
}

export function isNetworkError(error: unknown): error is NetworkError {
  return error instanceof NetworkError;
}

export function isDecodeError(error: unknown): error is DecodeError {
  return error instanceof DecodeError;
}

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "CanceledError");
}

/**
 * Normalise anything a fetcher or decoder threw. Errors that are already
 * typed pass through; aborts become cancellations; the rest is treated as
 * a transport failure.
 */
export function toImageCacheError(error: unknown, locator: string): ImageCacheError {
  if (error instanceof ImageCacheError) return error;
  if (isAbortError(error)) return new CancelledError(locator);
  const message = error instanceof Error ? error.message : String(error);
  return new NetworkError(locator, message || "Image request failed", { cause: error });
}
