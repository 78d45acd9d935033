import crypto from "node:crypto";
import { TextDecoder } from "node:util";
import { AppConfig } from "../config";
import { errorMessage, Logger, MetricsRegistry } from "../observability";
import { ResponseCache } from "../store";
import { HttpRequestError } from "./errors";
import { FetchLike, getFetchDispatcher, undiciFetch } from "./fetch";

export interface FetchedResponse {
  url: string;
  status: number;
  contentType?: string;
  body: Buffer;
  fromCache: boolean;
}

export interface SessionOptions {
  config: AppConfig;
  cache: ResponseCache;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn?: FetchLike;
}

export function requestKey(method: string, url: string): string {
  return crypto.createHash("sha256").update(`${method} ${url}`).digest("hex");
}

// Only 2xx responses are stored; entries never expire until clearCache().
export class CachedSession {
  private readonly config: AppConfig;
  private readonly cache: ResponseCache;
  private readonly logger: Logger;
  private readonly metrics: MetricsRegistry;
  private readonly fetchFn: FetchLike;

  constructor(options: SessionOptions) {
    this.config = options.config;
    this.cache = options.cache;
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.fetchFn = options.fetchFn ?? undiciFetch;
  }

  async get(url: string): Promise<FetchedResponse> {
    const key = requestKey("GET", url);
    const cached = await this.cache.get(key);
    if (cached) {
      this.metrics.incrementCounter("cache_hits", 1);
      this.logger.debug("cache_hit", { url, storedAt: cached.storedAt });
      return {
        url: cached.url,
        status: cached.status,
        contentType: cached.contentType,
        body: cached.body,
        fromCache: true,
      };
    }

    const stopTimer = this.metrics.startTimer("page_fetch_ms");
    let controller: AbortController | undefined;
    let timeout: NodeJS.Timeout | undefined;
    if (this.config.requestTimeoutMs !== undefined) {
      const abortController = new AbortController();
      controller = abortController;
      timeout = setTimeout(() => abortController.abort(), this.config.requestTimeoutMs);
    }

    let status: number;
    let contentType: string | undefined;
    let body: Buffer;
    try {
      const response = await this.fetchFn(url, {
        method: "GET",
        headers: {
          "user-agent": this.config.userAgent,
        },
        redirect: "follow",
        signal: controller?.signal,
        dispatcher: getFetchDispatcher(this.config.ignoreHttpsErrors),
      });

      if (!response.ok) {
        throw new HttpRequestError(url, `HTTP ${response.status} while fetching ${url}`, response.status);
      }

      status = response.status;
      contentType = response.headers.get("content-type") ?? undefined;
      body = Buffer.from(await response.arrayBuffer());
    } catch (error) {
      this.metrics.incrementCounter("fetch_failed", 1);
      if (error instanceof HttpRequestError) {
        throw error;
      }
      throw new HttpRequestError(url, `Request to ${url} failed: ${errorMessage(error)}`);
    } finally {
      clearTimeout(timeout);
    }

    const durationMs = stopTimer();
    this.metrics.incrementCounter("pages_fetched", 1);
    this.logger.debug("page_fetched", { url, status, bytes: body.length, durationMs });

    await this.cache.put({
      key,
      url,
      status,
      contentType,
      body,
      storedAt: new Date().toISOString(),
    });

    return { url, status, contentType, body, fromCache: false };
  }

  async clearCache(): Promise<number> {
    const removed = await this.cache.clear();
    this.logger.info("cache_cleared", { removed });
    return removed;
  }
}

export async function getResponse(session: CachedSession, url: string, logger: Logger): Promise<FetchedResponse | undefined> {
  try {
    return await session.get(url);
  } catch (error) {
    logger.error("fetch_failed", { url, error: errorMessage(error) });
    return undefined;
  }
}

function charsetOf(contentType: string | undefined): string | undefined {
  const match = contentType?.match(/charset\s*=\s*"?([^";]+)"?/i);
  return match ? match[1].trim() : undefined;
}

export function decodeText(response: FetchedResponse): string {
  const charset = charsetOf(response.contentType) ?? "utf-8";
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset);
  } catch {
    decoder = new TextDecoder("utf-8");
  }
  return decoder.decode(response.body);
}
