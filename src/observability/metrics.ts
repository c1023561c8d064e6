import { MetricCounterName, MetricTimerName } from "./types";

interface DurationSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

function summarizeDurations(values: readonly number[]): DurationSummary {
  if (values.length === 0) {
    return { count: 0, min: 0, max: 0, avg: 0 };
  }
  const total = values.reduce((sum, value) => sum + value, 0);
  return {
    count: values.length,
    min: Math.min(...values),
    max: Math.max(...values),
    avg: Math.round(total / values.length),
  };
}

export class MetricsRegistry {
  private readonly counters: Record<MetricCounterName, number> = {
    pages_fetched: 0,
    pages_failed: 0,
    pages_without_table: 0,
    rows_extracted: 0,
    codes_collected: 0,
    logos_saved: 0,
    logos_skipped: 0,
    logos_failed: 0,
  };
  private readonly durations: Record<MetricTimerName, number[]> = {
    page_fetch_ms: [],
    download_ms: [],
  };

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters[name] += value;
  }

  /** Returns a stop function that records and returns the elapsed milliseconds. */
  startTimer(name: MetricTimerName): () => number {
    const startedAt = Date.now();
    return () => {
      const elapsed = Date.now() - startedAt;
      this.durations[name].push(elapsed);
      return elapsed;
    };
  }

  getCounters(): Record<MetricCounterName, number> {
    return { ...this.counters };
  }

  printSummary(): void {
    console.log(
      JSON.stringify({
        ts: new Date().toISOString(),
        level: "info",
        msg: "metrics_summary",
        counters: this.getCounters(),
        timers: {
          page_fetch_ms: summarizeDurations(this.durations.page_fetch_ms),
          download_ms: summarizeDurations(this.durations.download_ms),
        },
      }),
    );
  }
}
