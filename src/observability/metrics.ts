import { Logger } from "./logger";
import { MetricCounterName, MetricTimerName } from "./types";

interface HistogramSummary {
  count: number;
  min: number;
  max: number;
  avg: number;
}

const TIMER_NAMES: readonly MetricTimerName[] = ["fetch_ms", "parse_ms", "summarize_ms"];

export class MetricsRegistry {
  private readonly counters = new Map<MetricCounterName, number>();
  private readonly timers = new Map<MetricTimerName, number[]>();

  incrementCounter(name: MetricCounterName, value = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + value);
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

  getCounter(name: MetricCounterName): number {
    return this.counters.get(name) ?? 0;
  }

  getCounters(): Record<MetricCounterName, number> {
    const counters = zeroCounters();
    for (const [name, value] of this.counters) {
      counters[name] = value;
    }
    return counters;
  }

  logSummary(logger: Logger): void {
    const timers: Partial<Record<MetricTimerName, HistogramSummary>> = {};
    for (const name of TIMER_NAMES) {
      const summary = this.summarize(name);
      if (summary.count > 0) {
        timers[name] = summary;
      }
    }

    logger.debug("metrics_summary", {
      counters: this.getCounters(),
      timers,
    });
  }

  private summarize(name: MetricTimerName): HistogramSummary {
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

function zeroCounters(): Record<MetricCounterName, number> {
  return {
    pages_discovered: 0,
    scrape_ok: 0,
    scrape_failed: 0,
    parse_ok: 0,
    parse_failed: 0,
    summarize_ok: 0,
    summarize_failed: 0,
    pages_composed: 0,
  };
}
