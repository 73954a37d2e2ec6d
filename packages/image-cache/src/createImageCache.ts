import { parseImageCacheConfig, type ImageCacheConfigInput } from "./config";
import { assertImage } from "./decode";
import { createHttpFetcher } from "./fetchers/http";
import { ImageCache } from "./ImageCache";
import { DiskImageStore } from "./store/diskStore";
import type { ImageDecoder, ImageFetcher, ImageStore } from "./types";
import { createLogger, type Logger } from "./utils/logger";

export interface ImageCacheDependencies {
  fetcher?: ImageFetcher;
  decoder?: ImageDecoder;
  store?: ImageStore;
  logger?: Logger;
}

/**
 * Build a cache from validated config. Defaults: axios fetcher with the
 * configured timeout, signature check when `validateImages` is on, and a
 * disk tier when `diskCacheDir` is set.
 */
export function createImageCache(
  input: ImageCacheConfigInput = {},
  deps: ImageCacheDependencies = {}
): ImageCache {
  const config = parseImageCacheConfig(input);
  const log = deps.logger ?? createLogger({ scope: "image-cache", level: config.logLevel });

  const store =
    deps.store ?? (config.diskCacheDir ? new DiskImageStore(config.diskCacheDir, log) : undefined);
  const decoder = config.validateImages ? (deps.decoder ?? assertImage) : undefined;

  return new ImageCache({
    fetcher: deps.fetcher ?? createHttpFetcher({ timeoutMs: config.requestTimeoutMs }),
    decoder,
    store,
    logger: log,
    maxBytes: config.maxBytes,
    maxEntries: config.maxEntries,
  });
}
