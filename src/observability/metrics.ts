import { Logger } from "./logger";
import { MetricCounterName, MetricTimerName } from "./types";

interface TimerSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
  }

  getCounter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const durationMs = Date.now() - startedAt;
      const values = this.timers.get(name) ?? [];
      values.push(durationMs);
      this.timers.set(name, values);
      return durationMs;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      pages_fetched: this.getCounter("pages_fetched"),
      cache_hits: this.getCounter("cache_hits"),
      fetch_failed: this.getCounter("fetch_failed"),
      rows_emitted: this.getCounter("rows_emitted"),
      files_saved: this.getCounter("files_saved"),
    };
  }

  getTimerSummaries(): Record<MetricTimerName, TimerSummary> {
    return {
      page_fetch_ms: this.summarize("page_fetch_ms"),
    };
  }

  logSummary(logger: Logger): void {
    logger.info("metrics_summary", {
      counters: this.getCounters(),
      timers: this.getTimerSummaries(),
    });
  }

  private summarize(name: MetricTimerName): TimerSummary {
    const values = this.timers.get(name) ?? [];
    if (values.length === 0) {
      return { count: 0, min: 0, max: 0, avg: 0 };
    }

    let total = 0;
    let min = values[0];
    let max = values[0];
    for (const value of values) {
      total += value;
      min = Math.min(min, value);
      max = Math.max(max, value);
    }

    return {
      count: values.length,
      min,
      max,
      avg: Number((total / values.length).toFixed(2)),
    };
  }
}
