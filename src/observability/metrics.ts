import { MetricCounterName, MetricTimerName } from "./types";

export interface TimerSummary {
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

  /** Times `task` whether it resolves or rejects. */
  async time<T>(name: MetricTimerName, task: () => Promise<T>): Promise<T> {
    const stop = this.startTimer(name);
    try {
      return await task();
    } finally {
      stop();
    }
  }

  getCounters(): Record<MetricCounterName, number> {
    return {
      passes: this.getCounter("passes"),
      fetch_attempts: this.getCounter("fetch_attempts"),
      fetch_ok: this.getCounter("fetch_ok"),
      fetch_failed: this.getCounter("fetch_failed"),
      parse_ok: this.getCounter("parse_ok"),
      parse_failed: this.getCounter("parse_failed"),
      ingest_ok: this.getCounter("ingest_ok"),
      exhausted: this.getCounter("exhausted"),
      reconcile_fixes: this.getCounter("reconcile_fixes"),
      lease_conflicts: this.getCounter("lease_conflicts"),
      pass_errors: this.getCounter("pass_errors"),
    };
  }

  getTimerSummaries(): Record<MetricTimerName, TimerSummary> {
    return {
      fetch_ms: this.summarize("fetch_ms"),
      parse_ms: this.summarize("parse_ms"),
      pass_ms: this.summarize("pass_ms"),
    };
  }

  printSummary(): void {
    console.log(
      JSON.stringify(
        {
          ts: new Date().toISOString(),
          level: "info",
          msg: "metrics_summary",
          counters: this.getCounters(),
          timers: this.getTimerSummaries(),
        },
        null,
        2,
      ),
    );
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
