import { createHash } from "crypto";
import { mkdir, readFile, readdir, rename, rm, writeFile } from "fs/promises";
import path from "path";
import { z } from "zod";

import type { ImageStore, StoredImage } from "../types";
import { logger as defaultLogger, type Logger } from "../utils/logger";

const RECORD_SUFFIX = ".json";

const storedRecordSchema = z.object({
  key: z.string(),
  bytes: z.string(),
  storedAt: z.string().datetime(),
});

type StoredRecord = z.infer<typeof storedRecordSchema>;

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * One JSON record per image, named after the SHA-256 of its locator.
 * Unreadable or mismatched records read as misses.
 */
export class DiskImageStore implements ImageStore {
  private readonly log: Logger;

  constructor(
    readonly directory: string,
    log: Logger = defaultLogger
  ) {
    this.log = log.child("disk");
  }

  fileFor(key: string): string {
    const digest = createHash("sha256").update(key).digest("hex");
    return path.join(this.directory, `${digest}${RECORD_SUFFIX}`);
  }

  async get(key: string): Promise<StoredImage | undefined> {
    const file = this.fileFor(key);
    let raw: string;
    try {
      raw = await readFile(file, "utf8");
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.log.warn("Ignoring unreadable cache record", { file, error: String(error) });
      return undefined;
    }

    const parsed = storedRecordSchema.safeParse(json);
    if (!parsed.success || parsed.data.key !== key) {
      this.log.warn("Ignoring malformed cache record", { file });
      return undefined;
    }

    return {
      key,
      bytes: new Uint8Array(Buffer.from(parsed.data.bytes, "base64")),
      storedAt: new Date(parsed.data.storedAt),
    };
  }

  async set(key: string, bytes: Uint8Array, storedAt: Date = new Date()): Promise<void> {
    const record: StoredRecord = {
      key,
      bytes: Buffer.from(bytes).toString("base64"),
      storedAt: storedAt.toISOString(),
    };
    const file = this.fileFor(key);
    const temp = `${file}.${process.pid}.${Date.now()}.tmp`;

    await mkdir(this.directory, { recursive: true });
    await writeFile(temp, JSON.stringify(record), "utf8");
    await rename(temp, file);
  }

  async delete(key: string): Promise<void> {
    await rm(this.fileFor(key), { force: true });
  }

  async clear(): Promise<void> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) return;
      throw error;
    }

    await Promise.all(
      names
        .filter((name) => name.endsWith(RECORD_SUFFIX) || name.endsWith(".tmp"))
        .map((name) => rm(path.join(this.directory, name), { force: true }))
    );
  }
}
