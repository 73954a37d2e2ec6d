import { z } from "zod";

import { LOG_LEVELS } from "./utils/logger";

export const DEFAULT_MAX_BYTES = 50 * 1024 * 1024;
export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;

export const imageCacheConfigSchema = z.object({
  maxBytes: z.number().int().positive().default(DEFAULT_MAX_BYTES),
  maxEntries: z.number().int().positive().optional(),
  requestTimeoutMs: z.number().int().positive().default(DEFAULT_REQUEST_TIMEOUT_MS),
  diskCacheDir: z.string().min(1).optional(),
  validateImages: z.boolean().default(true),
  logLevel: z.enum(LOG_LEVELS).default("warn"),
});

export type ImageCacheConfig = z.infer<typeof imageCacheConfigSchema>;
export type ImageCacheConfigInput = z.input<typeof imageCacheConfigSchema>;

export function parseImageCacheConfig(input: unknown = {}): ImageCacheConfig {
  return imageCacheConfigSchema.parse(input);
}

// ============================================================================
// Environment
// ============================================================================

export const IMAGE_CACHE_ENV_KEYS = [
  "IMAGE_CACHE_MAX_BYTES",
  "IMAGE_CACHE_MAX_ENTRIES",
  "IMAGE_CACHE_TIMEOUT_MS",
  "IMAGE_CACHE_DISK_DIR",
  "IMAGE_CACHE_VALIDATE",
  "IMAGE_CACHE_LOG_LEVEL",
] as const;

const wholeNumber = z
  .string()
  .regex(/^\d+$/, "Expected a whole number")
  .transform((value) => Number(value));

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  IMAGE_CACHE_MAX_BYTES: wholeNumber.optional(),
  IMAGE_CACHE_MAX_ENTRIES: wholeNumber.optional(),
  IMAGE_CACHE_TIMEOUT_MS: wholeNumber.optional(),
  IMAGE_CACHE_DISK_DIR: z.string().optional(),
  IMAGE_CACHE_VALIDATE: flag.optional(),
  IMAGE_CACHE_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

/**
 * Build a config from `IMAGE_CACHE_*` variables. Unset or blank variables
 * take the schema defaults; malformed ones throw a `ZodError`.
 */
export function loadImageCacheConfig(
  env: Record<string, string | undefined> = process.env
): ImageCacheConfig {
  const present: Record<string, string> = {};
  for (const key of IMAGE_CACHE_ENV_KEYS) {
    const value = env[key]?.trim();
    if (value) present[key] = value;
  }

  const vars = envSchema.parse(present);
  return parseImageCacheConfig({
    maxBytes: vars.IMAGE_CACHE_MAX_BYTES,
    maxEntries: vars.IMAGE_CACHE_MAX_ENTRIES,
    requestTimeoutMs: vars.IMAGE_CACHE_TIMEOUT_MS,
    diskCacheDir: vars.IMAGE_CACHE_DISK_DIR,
    validateImages: vars.IMAGE_CACHE_VALIDATE,
    logLevel: vars.IMAGE_CACHE_LOG_LEVEL,
  });
}
