import { AppConfig } from "../config";
import { FileResponseCache } from "./fileResponseCache";
import { ResponseCache } from "./types";

export function createResponseCache(config: AppConfig): ResponseCache {
  return new FileResponseCache(config.cacheDir);
}

export { FileResponseCache } from "./fileResponseCache";
export { InMemoryResponseCache } from "./memoryResponseCache";
export * from "./types";
