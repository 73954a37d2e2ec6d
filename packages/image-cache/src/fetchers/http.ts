import axios, { type AxiosInstance } from "axios";

import { DEFAULT_REQUEST_TIMEOUT_MS } from "../config";
import { CancelledError, NetworkError, type ImageCacheError } from "../errors";
import type { ImageFetcher } from "../types";

export interface HttpFetcherOptions {
  timeoutMs?: number;
  headers?: Record<string, string>;
  /** Pre-configured client, e.g. one carrying auth interceptors. */
  client?: AxiosInstance;
}

/**
 * Fetch image bytes over HTTP(S). Non-2xx responses, timeouts and
 * transport failures reject with `NetworkError`; aborts with `CancelledError`.
 */
export function createHttpFetcher(options: HttpFetcherOptions = {}): ImageFetcher {
  const client =
    options.client ??
    axios.create({
      timeout: options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS,
      headers: { Accept: "image/*", ...options.headers },
    });

  return async (locator, signal) => {
    try {
      const response = await client.get<ArrayBuffer>(locator, {
        signal,
        responseType: "arraybuffer",
      });
      return new Uint8Array(response.data);
    } catch (err: unknown) {
      throw toFetchError(err, locator);
    }
  };
}

function toFetchError(err: unknown, locator: string): ImageCacheError {
  if (axios.isCancel(err)) {
    return new CancelledError(locator);
  }
  if (axios.isAxiosError(err)) {
    if (err.response) {
      return new NetworkError(locator, `Request failed with status ${err.response.status}`, {
        status: err.response.status,
        cause: err,
      });
    }
    if (err.code === "ECONNABORTED" || err.code === "ETIMEDOUT") {
      return new NetworkError(locator, "Request timed out", { cause: err });
    }
    return new NetworkError(locator, err.message || "Network request failed", { cause: err });
  }
  const message = err instanceof Error ? err.message : "Network request failed";
  return new NetworkError(locator, message, { cause: err });
}
