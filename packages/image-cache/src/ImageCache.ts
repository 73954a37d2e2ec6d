/**
 * In-memory image cache with single-flight loading and LRU eviction.
 *
 * Every locator has at most one load in flight; concurrent callers join
 * it and receive the same outcome. Completed loads are kept under a byte
 * budget (and optionally an entry count), evicting the least recently
 * used entry first. Failures are never cached.
 */

import { DEFAULT_MAX_BYTES } from "./config";
import { CancelledError, toImageCacheError, type ImageCacheError } from "./errors";
import type {
  FetchOptions,
  ImageCacheEntry,
  ImageCacheStats,
  ImageDecoder,
  ImageFetchResult,
  ImageFetcher,
  ImageStore,
  LocatorState,
} from "./types";
import { logger as defaultLogger, type Logger } from "./utils/logger";

export interface ImageCacheOptions {
  fetcher: ImageFetcher;
  maxBytes?: number;
  maxEntries?: number;
  /** Validates fetched bytes before they are stored; omit to skip. */
  decoder?: ImageDecoder;
  store?: ImageStore;
  logger?: Logger;
  now?: () => number;
}

interface Subscriber {
  resolve: (bytes: Uint8Array) => void;
  reject: (error: ImageCacheError) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
  settled: boolean;
}

interface InFlightLoad {
  key: string;
  subscribers: Subscriber[];
  controller: AbortController;
  /** Set by invalidate/clear: deliver the result but do not store it. */
  discard: boolean;
}

interface LoadedImage {
  bytes: Uint8Array;
  fromStore: boolean;
}

export class ImageCache {
  readonly maxBytes: number;
  readonly maxEntries?: number;

  private readonly fetcher: ImageFetcher;
  private readonly decoder?: ImageDecoder;
  private readonly store?: ImageStore;
  private readonly log: Logger;
  private readonly now: () => number;

  // Map iteration order is recency order: first key is least recently used.
  private readonly entries = new Map<string, ImageCacheEntry>();
  private readonly inFlight = new Map<string, InFlightLoad>();
  private readonly pendingWrites = new Set<Promise<void>>();
  // Disk records being removed; loads skip the disk tier for these.
  private readonly pendingDeletes = new Map<string, number>();
  private pendingClears = 0;
  private totalBytes = 0;
  private hits = 0;
  private misses = 0;
  private fetches = 0;
  private evictions = 0;

  constructor(options: ImageCacheOptions) {
    const maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;
    if (!Number.isInteger(maxBytes) || maxBytes <= 0) {
      throw new RangeError(`maxBytes must be a positive integer, got ${maxBytes}`);
    }
    if (
      options.maxEntries !== undefined &&
      (!Number.isInteger(options.maxEntries) || options.maxEntries <= 0)
    ) {
      throw new RangeError(`maxEntries must be a positive integer, got ${options.maxEntries}`);
    }

    this.maxBytes = maxBytes;
    this.maxEntries = options.maxEntries;
    this.fetcher = options.fetcher;
    this.decoder = options.decoder;
    this.store = options.store;
    this.log = options.logger ?? defaultLogger;
    this.now = options.now ?? Date.now;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  /**
   * Resolve with the bytes for `locator`, loading them if needed. Each
   * caller receives its own copy. Rejects with `NetworkError`,
   * `DecodeError` or `CancelledError`.
   */
  fetch(locator: string, options: FetchOptions = {}): Promise<Uint8Array> {
    const { signal } = options;
    if (signal?.aborted) {
      return Promise.reject(new CancelledError(locator));
    }

    const entry = this.entries.get(locator);
    if (entry) {
      this.hits++;
      this.touch(entry);
      return Promise.resolve(entry.bytes.slice());
    }

    this.misses++;
    return new Promise<Uint8Array>((resolve, reject) => {
      const load = this.inFlight.get(locator) ?? this.startLoad(locator);
      this.subscribe(load, { resolve, reject, signal, settled: false });
    });
  }

  /** Like `fetch`, but reports failure as a value instead of rejecting. */
  async fetchResult(locator: string, options: FetchOptions = {}): Promise<ImageFetchResult> {
    try {
      return { ok: true, bytes: await this.fetch(locator, options) };
    } catch (error) {
      return { ok: false, error: toImageCacheError(error, locator) };
    }
  }

  /** Cached bytes without loading. Counts as a use for eviction order. */
  peek(locator: string): Uint8Array | undefined {
    const entry = this.entries.get(locator);
    if (!entry) return undefined;
    this.touch(entry);
    return entry.bytes.slice();
  }

  has(locator: string): boolean {
    return this.entries.has(locator);
  }

  state(locator: string): LocatorState {
    if (this.entries.has(locator)) return "cached";
    if (this.inFlight.has(locator)) return "fetching";
    return "absent";
  }

  /** Locators from least to most recently used. */
  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  stats(): ImageCacheStats {
    return {
      entries: this.entries.size,
      totalBytes: this.totalBytes,
      maxBytes: this.maxBytes,
      maxEntries: this.maxEntries,
      inFlight: this.inFlight.size,
      hits: this.hits,
      misses: this.misses,
      fetches: this.fetches,
      evictions: this.evictions,
    };
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  /**
   * Drop the entry for `locator` from memory and disk. A load already in
   * flight still answers its callers but its result is not stored.
   */
  async invalidate(locator: string): Promise<void> {
    this.remove(locator);
    const load = this.inFlight.get(locator);
    if (load) load.discard = true;
    this.log.debug("Invalidated image", { locator });

    if (this.store) {
      this.pendingDeletes.set(locator, (this.pendingDeletes.get(locator) ?? 0) + 1);
      try {
        await this.settleWrites();
        await this.store.delete(locator);
      } catch (error) {
        this.log.warn("Failed to delete cached image from disk", { locator, error: String(error) });
      } finally {
        const remaining = (this.pendingDeletes.get(locator) ?? 1) - 1;
        if (remaining > 0) this.pendingDeletes.set(locator, remaining);
        else this.pendingDeletes.delete(locator);
      }
    }
  }

  async clear(): Promise<void> {
    const count = this.entries.size;
    this.entries.clear();
    this.totalBytes = 0;
    for (const load of this.inFlight.values()) load.discard = true;
    this.log.debug("Cleared image cache", { entries: count });

    if (this.store) {
      this.pendingClears++;
      try {
        await this.settleWrites();
        await this.store.clear();
      } catch (error) {
        this.log.warn("Failed to clear disk cache", { error: String(error) });
      } finally {
        this.pendingClears--;
      }
    }
  }

  /** Resolves once every pending disk write has finished. */
  async flush(): Promise<void> {
    await this.settleWrites();
  }

  // ==========================================================================
  // Loading
  // ==========================================================================

  private startLoad(key: string): InFlightLoad {
    const load: InFlightLoad = {
      key,
      subscribers: [],
      controller: new AbortController(),
      discard: false,
    };
    this.inFlight.set(key, load);

    this.run(load).catch((error: unknown) => {
      this.fail(load, toImageCacheError(error, key));
    });
    return load;
  }

  private async run(load: InFlightLoad): Promise<void> {
    let loaded: LoadedImage;
    try {
      loaded = await this.load(load.key, load.controller.signal);
    } catch (error) {
      this.fail(load, toImageCacheError(error, load.key));
      return;
    }
    this.complete(load, loaded);
  }

  private async load(key: string, signal: AbortSignal): Promise<LoadedImage> {
    if (this.store && !this.isDiskStale(key)) {
      const stored = await this.readStore(key);
      if (stored) return { bytes: stored, fromStore: true };
    }
    if (signal.aborted) throw new CancelledError(key);

    this.fetches++;
    this.log.debug("Fetching image", { locator: key });
    const bytes = await this.fetcher(key, signal);
    if (signal.aborted) throw new CancelledError(key);

    if (this.decoder) await this.decoder(bytes, key);
    return { bytes, fromStore: false };
  }

  private isDiskStale(key: string): boolean {
    return this.pendingClears > 0 || this.pendingDeletes.has(key);
  }

  private async readStore(key: string): Promise<Uint8Array | undefined> {
    if (!this.store) return undefined;
    try {
      const stored = await this.store.get(key);
      return stored?.bytes;
    } catch (error) {
      this.log.warn("Failed to read cached image from disk", { locator: key, error: String(error) });
      return undefined;
    }
  }

  private complete(load: InFlightLoad, loaded: LoadedImage): void {
    this.release(load);
    const bytes = loaded.bytes.slice();

    if (!load.discard && !load.controller.signal.aborted) {
      const stored = this.insert(load.key, bytes);
      if (stored && !loaded.fromStore) this.writeStore(load.key, bytes);
    }

    for (const subscriber of load.subscribers) {
      this.settle(subscriber, () => subscriber.resolve(bytes.slice()));
    }
    load.subscribers = [];
  }

  private fail(load: InFlightLoad, error: ImageCacheError): void {
    this.release(load);
    if (error.code === "CANCELLED") {
      this.log.debug("Image load cancelled", { locator: load.key });
    } else {
      this.log.info("Image load failed", { locator: load.key, code: error.code, message: error.message });
    }

    for (const subscriber of load.subscribers) {
      this.settle(subscriber, () => subscriber.reject(error));
    }
    load.subscribers = [];
  }

  private release(load: InFlightLoad): void {
    if (this.inFlight.get(load.key) === load) {
      this.inFlight.delete(load.key);
    }
  }

  // ==========================================================================
  // Subscribers
  // ==========================================================================

  private subscribe(load: InFlightLoad, subscriber: Subscriber): void {
    load.subscribers.push(subscriber);
    const { signal } = subscriber;
    if (!signal) return;

    subscriber.onAbort = () => this.abandon(load, subscriber);
    signal.addEventListener("abort", subscriber.onAbort, { once: true });
  }

  private settle(subscriber: Subscriber, deliver: () => void): void {
    if (subscriber.settled) return;
    subscriber.settled = true;
    if (subscriber.signal && subscriber.onAbort) {
      subscriber.signal.removeEventListener("abort", subscriber.onAbort);
    }
    deliver();
  }

  /**
   * A caller aborted. It is rejected at once; the load itself is aborted
   * only when nobody else is still waiting on it.
   */
  private abandon(load: InFlightLoad, subscriber: Subscriber): void {
    this.settle(subscriber, () => subscriber.reject(new CancelledError(load.key)));
    load.subscribers = load.subscribers.filter((other) => other !== subscriber);

    if (load.subscribers.length === 0 && this.inFlight.get(load.key) === load) {
      this.inFlight.delete(load.key);
      load.controller.abort();
      this.log.debug("Aborted image load with no remaining callers", { locator: load.key });
    }
  }

  // ==========================================================================
  // Storage
  // ==========================================================================

  private insert(key: string, bytes: Uint8Array): boolean {
    const sizeBytes = bytes.byteLength;
    if (sizeBytes > this.maxBytes) {
      this.log.warn("Image exceeds cache budget and was not stored", {
        locator: key,
        sizeBytes,
        maxBytes: this.maxBytes,
      });
      return false;
    }

    this.remove(key);
    this.entries.set(key, { key, bytes, sizeBytes, lastAccessed: this.now() });
    this.totalBytes += sizeBytes;
    this.evict();
    return true;
  }

  private evict(): void {
    while (
      this.totalBytes > this.maxBytes ||
      (this.maxEntries !== undefined && this.entries.size > this.maxEntries)
    ) {
      const oldest = this.entries.values().next();
      if (oldest.done) return;
      this.remove(oldest.value.key);
      this.evictions++;
      this.log.debug("Evicted image", { locator: oldest.value.key, sizeBytes: oldest.value.sizeBytes });
    }
  }

  private remove(key: string): void {
    const entry = this.entries.get(key);
    if (!entry) return;
    this.entries.delete(key);
    this.totalBytes -= entry.sizeBytes;
  }

  private touch(entry: ImageCacheEntry): void {
    entry.lastAccessed = this.now();
    this.entries.delete(entry.key);
    this.entries.set(entry.key, entry);
  }

  private writeStore(key: string, bytes: Uint8Array): void {
    const store = this.store;
    if (!store) return;

    const write = store.set(key, bytes).catch((error: unknown) => {
      this.log.warn("Failed to write image to disk", { locator: key, error: String(error) });
    });
    this.pendingWrites.add(write);
    write.finally(() => this.pendingWrites.delete(write)).catch((error: unknown) => {
      this.log.error("Unexpected disk write failure", error, { locator: key });
    });
  }

  private async settleWrites(): Promise<void> {
    await Promise.all(Array.from(this.pendingWrites));
  }
}
