import type { ImageCacheError } from "./errors";

/**
 * Retrieves the raw bytes behind a locator. Implementations should stop
 * work and reject when `signal` aborts.
 */
export type ImageFetcher = (locator: string, signal: AbortSignal) => Promise<Uint8Array>;

/** Throws a `DecodeError` when the bytes are not a usable image. */
export type ImageDecoder = (bytes: Uint8Array, locator: string) => void | Promise<void>;

export interface StoredImage {
  key: string;
  bytes: Uint8Array;
  storedAt: Date;
}

/** Persistent second tier consulted before the fetcher. */
export interface ImageStore {
  get(key: string): Promise<StoredImage | undefined>;
  set(key: string, bytes: Uint8Array, storedAt?: Date): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
}

export interface ImageCacheEntry {
  readonly key: string;
  readonly bytes: Uint8Array;
  readonly sizeBytes: number;
  lastAccessed: number;
}

export type LocatorState = "absent" | "fetching" | "cached";

export type ImageFetchResult =
  | { ok: true; bytes: Uint8Array }
  | { ok: false; error: ImageCacheError };

export interface FetchOptions {
  signal?: AbortSignal;
}

export interface ImageCacheStats {
  entries: number;
  totalBytes: number;
  maxBytes: number;
  maxEntries?: number;
  inFlight: number;
  /** `fetch` calls answered from memory. */
  hits: number;
  /** `fetch` calls that started or joined a load. */
  misses: number;
  /** Calls made to the fetcher. */
  fetches: number;
  evictions: number;
}
