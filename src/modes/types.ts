import { AppConfig } from "../config";
import { PageStructureError } from "../core/errors";
import { CachedSession } from "../core/session";
import { Logger, MetricsRegistry } from "../observability";
import { ModeResult } from "../types";

export interface ModeDependencies {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  session: CachedSession;
}

export type ModeHandler = (deps: ModeDependencies) => Promise<ModeResult>;

export function fatal(error: PageStructureError): ModeResult {
  return { status: "fatal", error };
}

export function skipped(url: string): ModeResult {
  return { status: "skipped", reason: `No response from ${url}` };
}
