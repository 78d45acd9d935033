import { CachedResponse, ResponseCache } from "./types";

export class InMemoryResponseCache implements ResponseCache {
  private readonly entries = new Map<string, CachedResponse>();

  async get(key: string): Promise<CachedResponse | undefined> {
    return this.entries.get(key);
  }

  async put(entry: CachedResponse): Promise<void> {
    this.entries.set(entry.key, entry);
  }

  async clear(): Promise<number> {
    const removed = this.entries.size;
    this.entries.clear();
    return removed;
  }

  async size(): Promise<number> {
    return this.entries.size;
  }

  async close(): Promise<void> {
    return;
  }
}
