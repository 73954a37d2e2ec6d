import { ZodError } from "zod";

import { loadImageCacheConfig, parseImageCacheConfig } from "../config";

describe("image cache config", () => {
  it("should fill in defaults", () => {
    expect(parseImageCacheConfig()).toEqual({
      maxBytes: 52_428_800,
      requestTimeoutMs: 15_000,
      validateImages: true,
      logLevel: "warn",
    });
  });

  it("should reject non-positive budgets", () => {
    expect(() => parseImageCacheConfig({ maxBytes: 0 })).toThrow(ZodError);
    expect(() => parseImageCacheConfig({ maxEntries: -1 })).toThrow(ZodError);
  });

  describe("loadImageCacheConfig", () => {
    it("should read IMAGE_CACHE_ variables", () => {
      const config = loadImageCacheConfig({
        IMAGE_CACHE_MAX_BYTES: "1048576",
        IMAGE_CACHE_MAX_ENTRIES: "200",
        IMAGE_CACHE_TIMEOUT_MS: "5000",
        IMAGE_CACHE_DISK_DIR: "/var/cache/images",
        IMAGE_CACHE_VALIDATE: "false",
        IMAGE_CACHE_LOG_LEVEL: "debug",
        UNRELATED: "ignored",
      });

      expect(config).toEqual({
        maxBytes: 1_048_576,
        maxEntries: 200,
        requestTimeoutMs: 5000,
        diskCacheDir: "/var/cache/images",
        validateImages: false,
        logLevel: "debug",
      });
    });

    it("should treat blank variables as unset", () => {
      const config = loadImageCacheConfig({ IMAGE_CACHE_MAX_BYTES: " ", IMAGE_CACHE_DISK_DIR: "" });

      expect(config.maxBytes).toBe(52_428_800);
      expect(config.diskCacheDir).toBeUndefined();
    });

    it("should accept 1 and 0 as flags", () => {
      expect(loadImageCacheConfig({ IMAGE_CACHE_VALIDATE: "0" }).validateImages).toBe(false);
      expect(loadImageCacheConfig({ IMAGE_CACHE_VALIDATE: "1" }).validateImages).toBe(true);
    });

    it("should reject malformed values", () => {
      expect(() => loadImageCacheConfig({ IMAGE_CACHE_MAX_BYTES: "lots" })).toThrow(ZodError);
      expect(() => loadImageCacheConfig({ IMAGE_CACHE_LOG_LEVEL: "verbose" })).toThrow(ZodError);
      expect(() => loadImageCacheConfig({ IMAGE_CACHE_MAX_ENTRIES: "0" })).toThrow(ZodError);
    });
  });
});
