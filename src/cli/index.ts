import { loadConfig } from "../config";
import { runMode } from "../core/commands";
import { FetchLike } from "../core/fetch";
import { CachedSession } from "../core/session";
import { createRunId, Logger, LogWriter, MetricsRegistry } from "../observability";
import { createSink, LineWriter } from "../sink";
import { createResponseCache, ResponseCache } from "../store";
import { isModeName, MODE_NAMES, ModeName, OutputMode } from "../types";

export interface ParsedCliArgs {
  mode: ModeName;
  clearCache: boolean;
  output: OutputMode;
  ignoreHttpsErrors: boolean;
  configPath?: string;
}

export type CliParseResult = ParsedCliArgs | "help" | { error: string };

export interface CliDependencies {
  fetchFn?: FetchLike;
  cache?: ResponseCache;
  env?: NodeJS.ProcessEnv;
  stdout?: LineWriter;
  logWriter?: LogWriter;
}

const HELP_TEXT = `
Usage:
  docs-scraper <mode> [options]

Modes:
  ${MODE_NAMES.join("\n  ")}

Options:
  -c, --clear-cache        Clear the HTTP response cache before running
  -o, --output <mode>      Output mode: pretty (console table) or file (CSV)
  --config <path>          Optional path to JSON config file
  --ignore-https-errors    Ignore TLS certificate errors (use only when required)
  -h, --help               Show this help
`;

export function parseCliArgs(argv: string[]): CliParseResult {
  let modeRaw: string | undefined;
  let clearCache = false;
  let output: OutputMode = "none";
  let ignoreHttpsErrors = false;
  let configPath: string | undefined;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    switch (arg) {
      case "-h":
      case "--help":
        return "help";
      case "-c":
      case "--clear-cache":
        clearCache = true;
        break;
      case "--ignore-https-errors":
        ignoreHttpsErrors = true;
        break;
      case "-o":
      case "--output": {
        index += 1;
        const value = argv[index];
        if (value !== "pretty" && value !== "file") {
          return { error: `Invalid output mode: ${value ?? "(missing)"} (expected pretty or file)` };
        }
        output = value;
        break;
      }
      case "--config": {
        index += 1;
        const value = argv[index];
        if (!value) {
          return { error: "--config requires a path" };
        }
        configPath = value;
        break;
      }
      default:
        if (arg.startsWith("-")) {
          return { error: `Unknown option: ${arg}` };
        }
        if (modeRaw !== undefined) {
          return { error: `Unexpected argument: ${arg}` };
        }
        modeRaw = arg;
    }
  }

  if (modeRaw === undefined) {
    return "help";
  }
  if (!isModeName(modeRaw)) {
    return { error: `Unknown mode: ${modeRaw}` };
  }

  return { mode: modeRaw, clearCache, output, ignoreHttpsErrors, configPath };
}

export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    (deps.stdout ?? console.log)(HELP_TEXT.trim());
    return 0;
  }
  if ("error" in parsed) {
    console.error(`${parsed.error}\n\n${HELP_TEXT.trim()}`);
    return 1;
  }

  let config = loadConfig(parsed.configPath, deps.env);
  if (parsed.ignoreHttpsErrors) {
    config = {
      ...config,
      ignoreHttpsErrors: true,
    };
  }

  const runId = createRunId(parsed.mode);
  const logger = new Logger({
    component: "cli",
    runId,
    level: config.logLevel,
    logFile: config.logFile,
    writer: deps.logWriter,
  });
  const metrics = new MetricsRegistry();
  const cache = deps.cache ?? createResponseCache(config);
  const session = new CachedSession({ config, cache, logger: logger.child("http"), metrics, fetchFn: deps.fetchFn });
  const sink = createSink(parsed.output, { config, logger: logger.child("output"), write: deps.stdout });

  logger.info("scraper_start", { ...parsed });

  try {
    if (parsed.clearCache) {
      await session.clearCache();
    }
    await runMode({ runId, config, logger, metrics, session, sink }, parsed.mode);
    logger.info("scraper_complete", { mode: parsed.mode });
    return 0;
  } finally {
    await cache.close();
    metrics.logSummary(logger);
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
