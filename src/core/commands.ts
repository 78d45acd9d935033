import { AppConfig } from "../config";
import { MODE_HANDLERS } from "../modes";
import { Logger, MetricsRegistry } from "../observability";
import { Sink } from "../sink";
import { ModeName, ModeResult } from "../types";
import { CachedSession } from "./session";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  session: CachedSession;
  sink: Sink;
}

export async function runMode(ctx: CommandContext, mode: ModeName): Promise<ModeResult> {
  ctx.logger.info("mode_start", { mode });
  const result = await MODE_HANDLERS[mode]({
    config: ctx.config,
    logger: ctx.logger.child(mode),
    metrics: ctx.metrics,
    session: ctx.session,
  });

  switch (result.status) {
    case "fatal":
      ctx.logger.error("mode_structure_error", { mode, error: result.error.message });
      throw result.error;
    case "skipped":
      ctx.logger.warn("mode_skipped", { mode, reason: result.reason });
      break;
    case "ok":
      ctx.metrics.incrementCounter("rows_emitted", Math.max(result.rows.length - 1, 0));
      await ctx.sink.publishRows(mode, result.rows);
      break;
    case "saved":
      break;
  }

  ctx.logger.info("mode_complete", { mode, status: result.status });
  return result;
}
