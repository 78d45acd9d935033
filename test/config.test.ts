import fs from "node:fs";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, loadConfig, parseConfigOverrides } from "../src/config";
import { ConfigError } from "../src/core/errors";
import { createTempDir } from "./helpers";

function writeConfigFile(content: unknown): string {
  const filePath = path.join(createTempDir(), "config.json");
  fs.writeFileSync(filePath, JSON.stringify(content), "utf-8");
  return filePath;
}

describe("loadConfig", () => {
  it("returns the defaults without file or environment", () => {
    const config = loadConfig(undefined, {});

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.mainDocUrl).toBe("https://docs.python.org/3/");
    expect(config.pepUrl).toBe("https://peps.python.org/");
    expect(config.expectedStatus.A).toEqual(["Active", "Accepted"]);
    expect(config.requestTimeoutMs).toBeUndefined();
    expect(config.cacheDir).toBe("data/http-cache");
  });

  it("applies file overrides and keeps unspecified defaults", () => {
    const filePath = writeConfigFile({
      requestTimeoutMs: 5000,
      outputDirs: { results: "out/results" },
      expectedStatus: { F: ["Final"] },
    });

    const config = loadConfig(filePath, {});

    expect(config.requestTimeoutMs).toBe(5000);
    expect(config.outputDirs).toEqual({ results: "out/results", downloads: "downloads" });
    expect(config.expectedStatus).toEqual({ F: ["Final"] });
    expect(config.userAgent).toBe(DEFAULT_CONFIG.userAgent);
  });

  it("lets environment variables win over the file", () => {
    const filePath = writeConfigFile({ pepUrl: "https://file.test/", logLevel: "warn" });

    const config = loadConfig(filePath, {
      PEP_URL: "https://env.test/",
      LOG_LEVEL: "DEBUG",
      IGNORE_HTTPS_ERRORS: "yes",
      REQUEST_TIMEOUT_MS: "1500",
      OUTPUT_DOWNLOADS_DIR: "/tmp/archives",
      CACHE_DIR: "/tmp/page-cache",
    });

    expect(config.pepUrl).toBe("https://env.test/");
    expect(config.logLevel).toBe("debug");
    expect(config.ignoreHttpsErrors).toBe(true);
    expect(config.requestTimeoutMs).toBe(1500);
    expect(config.outputDirs.downloads).toBe("/tmp/archives");
    expect(config.cacheDir).toBe("/tmp/page-cache");
  });

  it("ignores unusable environment values", () => {
    const config = loadConfig(undefined, { LOG_LEVEL: "loud", REQUEST_TIMEOUT_MS: "soon", IGNORE_HTTPS_ERRORS: "maybe" });

    expect(config.logLevel).toBe("info");
    expect(config.requestTimeoutMs).toBeUndefined();
    expect(config.ignoreHttpsErrors).toBe(false);
  });

  it("rejects a missing config file", () => {
    expect(() => loadConfig(path.join(createTempDir(), "absent.json"), {})).toThrow(ConfigError);
  });
});

describe("parseConfigOverrides", () => {
  it("rejects fields of the wrong type", () => {
    expect(() => parseConfigOverrides({ requestTimeoutMs: "fast" })).toThrow('Config field "requestTimeoutMs" must be a number');
    expect(() => parseConfigOverrides({ expectedStatus: { A: "Active" } })).toThrow(
      'Config field "expectedStatus.A" must be an array of strings',
    );
    expect(() => parseConfigOverrides({ logLevel: "verbose" })).toThrow(ConfigError);
    expect(() => parseConfigOverrides([1, 2])).toThrow("Config file must contain a JSON object");
  });

  it("ignores unknown fields", () => {
    expect(parseConfigOverrides({ somethingElse: true }).mainDocUrl).toBeUndefined();
  });
});
