export interface CachedResponse {
  key: string;
  url: string;
  status: number;
  contentType?: string;
  body: Buffer;
  storedAt: string;
}

export interface ResponseCache {
  get(key: string): Promise<CachedResponse | undefined>;
  put(entry: CachedResponse): Promise<void>;
  clear(): Promise<number>;
  size(): Promise<number>;
  close(): Promise<void>;
}
