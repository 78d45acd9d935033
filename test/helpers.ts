import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { AppConfig, DEFAULT_CONFIG } from "../src/config";
import { FetchInit, FetchLike, HttpResponseLike } from "../src/core/fetch";
import { CachedSession } from "../src/core/session";
import { ModeDependencies } from "../src/modes";
import { Logger, MetricsRegistry } from "../src/observability";
import { InMemoryResponseCache, ResponseCache } from "../src/store";

export interface FakeRoute {
  status?: number;
  body: string | Buffer;
  contentType?: string;
  bodyDelayMs?: number;
}

export interface FakeFetch {
  fetchFn: FetchLike;
  calls: Array<{ url: string; init: FetchInit }>;
}

export interface LogEntry {
  level: string;
  msg: string;
  component: string;
  [key: string]: unknown;
}

function toArrayBuffer(body: Buffer): ArrayBuffer {
  const copy = new ArrayBuffer(body.length);
  new Uint8Array(copy).set(body);
  return copy;
}

function waitForBody(delayMs: number, signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, delayMs);
    signal?.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        reject(new Error("aborted"));
      },
      { once: true },
    );
  });
}

function fakeResponse(url: string, route: FakeRoute, signal: AbortSignal | undefined): HttpResponseLike {
  const status = route.status ?? 200;
  const body = typeof route.body === "string" ? Buffer.from(route.body, "utf-8") : route.body;
  return {
    ok: status >= 200 && status < 300,
    status,
    url,
    headers: {
      get: (name: string) => (name.toLowerCase() === "content-type" ? (route.contentType ?? "text/html; charset=utf-8") : null),
    },
    arrayBuffer: async () => {
      if (route.bodyDelayMs !== undefined) {
        await waitForBody(route.bodyDelayMs, signal);
      }
      return toArrayBuffer(body);
    },
  };
}

// unknown URLs fail like a refused connection
export function createFakeFetch(routes: Record<string, FakeRoute | Error>): FakeFetch {
  const calls: FakeFetch["calls"] = [];
  const fetchFn: FetchLike = async (url, init) => {
    calls.push({ url, init });
    const route = routes[url];
    if (route instanceof Error) {
      throw route;
    }
    if (!route) {
      throw new Error(`connect ECONNREFUSED for ${url}`);
    }
    return fakeResponse(url, route, init.signal);
  };
  return { fetchFn, calls };
}

export function createTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "docs-scraper-"));
}

export function createTestConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  const root = createTempDir();
  return {
    ...DEFAULT_CONFIG,
    cacheDir: path.join(root, "cache"),
    outputDirs: {
      results: path.join(root, "results"),
      downloads: path.join(root, "downloads"),
    },
    ...overrides,
  };
}

export function createCapturingLogger(level: "debug" | "info" = "debug"): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({
    component: "test",
    runId: "run_test",
    level,
    writer: (line) => {
      entries.push(JSON.parse(line));
    },
  });
  return { logger, entries };
}

export interface TestHarness {
  deps: ModeDependencies;
  entries: LogEntry[];
  fake: FakeFetch;
  cache: ResponseCache;
}

export function createHarness(routes: Record<string, FakeRoute | Error>, config: AppConfig = createTestConfig()): TestHarness {
  const { logger, entries } = createCapturingLogger();
  const metrics = new MetricsRegistry();
  const fake = createFakeFetch(routes);
  const cache = new InMemoryResponseCache();
  const session = new CachedSession({ config, cache, logger, metrics, fetchFn: fake.fetchFn });
  return { deps: { config, logger, metrics, session }, entries, fake, cache };
}
