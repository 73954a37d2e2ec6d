import type { ImageStore, StoredImage } from "../types";
import { createLogger } from "../utils/logger";

export const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/** A PNG-signed buffer of exactly `size` bytes (size >= 8). */
export function pngBytes(size: number, fill = 0): Uint8Array {
  const bytes = new Uint8Array(size).fill(fill);
  bytes.set(PNG_SIGNATURE);
  return bytes;
}

export const silentLogger = createLogger({ level: "silent" });

export class Deferred<T> {
  readonly promise: Promise<T>;
  resolve: (value: T) => void = () => undefined;
  reject: (reason: unknown) => void = () => undefined;

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve;
      this.reject = reject;
    });
  }
}

/**
 * Fetcher whose responses are released by the test. Each call records its
 * deferred and signal under the locator; abort rejects the call.
 */
export function createControlledFetcher() {
  const pending = new Map<string, Deferred<Uint8Array>>();
  const signals = new Map<string, AbortSignal>();

  const fetcher = jest.fn((locator: string, signal: AbortSignal): Promise<Uint8Array> => {
    const deferred = new Deferred<Uint8Array>();
    pending.set(locator, deferred);
    signals.set(locator, signal);
    signal.addEventListener("abort", () => {
      const error = new Error("aborted");
      error.name = "AbortError";
      deferred.reject(error);
    });
    return deferred.promise;
  });

  const release = (locator: string, bytes: Uint8Array): void => {
    const deferred = pending.get(locator);
    if (!deferred) throw new Error(`No pending fetch for ${locator}`);
    deferred.resolve(bytes);
  };

  const failWith = (locator: string, error: unknown): void => {
    const deferred = pending.get(locator);
    if (!deferred) throw new Error(`No pending fetch for ${locator}`);
    deferred.reject(error);
  };

  return { fetcher, signals, release, failWith };
}

export class MemoryImageStore implements ImageStore {
  readonly records = new Map<string, StoredImage>();

  async get(key: string): Promise<StoredImage | undefined> {
    return this.records.get(key);
  }

  async set(key: string, bytes: Uint8Array, storedAt: Date = new Date()): Promise<void> {
    this.records.set(key, { key, bytes: bytes.slice(), storedAt });
  }

  async delete(key: string): Promise<void> {
    this.records.delete(key);
  }

  async clear(): Promise<void> {
    this.records.clear();
  }
}
