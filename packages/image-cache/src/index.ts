/**
 * @swatchkit/image-cache - Async Image Cache
 *
 * Single-flight loading, LRU eviction by byte budget and an optional
 * disk tier for remote images.
 */

// ============================================================================
// Cache
// ============================================================================

export { ImageCache } from "./ImageCache";
export type { ImageCacheOptions } from "./ImageCache";
export { createImageCache } from "./createImageCache";
export type { ImageCacheDependencies } from "./createImageCache";

export type {
  FetchOptions,
  ImageCacheEntry,
  ImageCacheStats,
  ImageDecoder,
  ImageFetchResult,
  ImageFetcher,
  ImageStore,
  LocatorState,
  StoredImage,
} from "./types";

// ============================================================================
// Errors
// ============================================================================

export {
  CancelledError,
  DecodeError,
  ImageCacheError,
  NetworkError,
  isCancelledError,
  isDecodeError,
  isImageCacheError,
  isNetworkError,
  isRetryableStatus,
  toImageCacheError,
} from "./errors";
export type { ImageCacheErrorCode, NetworkErrorOptions } from "./errors";

// ============================================================================
// Loading and storage
// ============================================================================

export { assertImage, detectImageFormat } from "./decode";
export type { ImageFormat } from "./decode";
export { createHttpFetcher } from "./fetchers/http";
export type { HttpFetcherOptions } from "./fetchers/http";
export { DiskImageStore } from "./store/diskStore";

// ============================================================================
// Configuration
// ============================================================================

export {
  DEFAULT_MAX_BYTES,
  DEFAULT_REQUEST_TIMEOUT_MS,
  IMAGE_CACHE_ENV_KEYS,
  imageCacheConfigSchema,
  loadImageCacheConfig,
  parseImageCacheConfig,
} from "./config";
export type { ImageCacheConfig, ImageCacheConfigInput } from "./config";

export { LOG_LEVELS, createLogger, logger } from "./utils/logger";
export type { LogContext, LogLevel, LogSink, Logger, LoggerOptions } from "./utils/logger";
