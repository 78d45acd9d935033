import fs from "node:fs";
import path from "node:path";
import { CachedResponse, ResponseCache } from "./types";

type ResponseMetadata = Omit<CachedResponse, "body">;

const METADATA_SUFFIX = ".json";
const BODY_SUFFIX = ".body";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseMetadata(raw: string): ResponseMetadata | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (!isRecord(parsed)) {
    return undefined;
  }

  const { key, url, status, contentType, storedAt } = parsed;
  if (typeof key !== "string" || typeof url !== "string" || typeof status !== "number" || typeof storedAt !== "string") {
    return undefined;
  }
  return {
    key,
    url,
    status,
    contentType: typeof contentType === "string" ? contentType : undefined,
    storedAt,
  };
}

export class FileResponseCache implements ResponseCache {
  private readonly cacheDir: string;

  constructor(cacheDir: string) {
    this.cacheDir = path.resolve(cacheDir);
  }

  async get(key: string): Promise<CachedResponse | undefined> {
    let metadata: ResponseMetadata | undefined;
    let body: Buffer;
    try {
      metadata = parseMetadata(await fs.promises.readFile(this.metadataPath(key), "utf-8"));
      body = await fs.promises.readFile(this.bodyPath(key));
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }

    if (!metadata || metadata.key !== key) {
      return undefined;
    }
    return { ...metadata, body };
  }

  async put(entry: CachedResponse): Promise<void> {
    await fs.promises.mkdir(this.cacheDir, { recursive: true });
    const metadata: ResponseMetadata = {
      key: entry.key,
      url: entry.url,
      status: entry.status,
      contentType: entry.contentType,
      storedAt: entry.storedAt,
    };
    // metadata last: an entry counts as stored once its .json exists
    await fs.promises.writeFile(this.bodyPath(entry.key), entry.body);
    await fs.promises.writeFile(this.metadataPath(entry.key), JSON.stringify(metadata), "utf-8");
  }

  async clear(): Promise<number> {
    const removed = await this.size();
    await fs.promises.rm(this.cacheDir, { recursive: true, force: true });
    return removed;
  }

  async size(): Promise<number> {
    let names: string[];
    try {
      names = await fs.promises.readdir(this.cacheDir);
    } catch (error) {
      if (isMissingFile(error)) {
        return 0;
      }
      throw error;
    }
    return names.filter((name) => name.endsWith(METADATA_SUFFIX)).length;
  }

  async close(): Promise<void> {
    return;
  }

  private metadataPath(key: string): string {
    return path.join(this.cacheDir, `${key}${METADATA_SUFFIX}`);
  }

  private bodyPath(key: string): string {
    return path.join(this.cacheDir, `${key}${BODY_SUFFIX}`);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
