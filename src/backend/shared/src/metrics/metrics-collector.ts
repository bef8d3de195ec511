/**
 * Metrics Collection Module
 *
 * In-process counters and histograms for the observer rule engine:
 * evaluation outcomes, per-rule failures, state writes and latency.
 */

/**
 * Metric types supported by the collector
 */
export const MetricType = {
  COUNTER: 'counter',
  HISTOGRAM: 'histogram',
} as const;

export type MetricType = (typeof MetricType)[keyof typeof MetricType];

export interface MetricEntry {
  name: string;
  type: MetricType;
  value: number;
  timestamp: Date;
  tags: Record<string, string>;
}

export interface HistogramBuckets {
  boundaries: number[];
  counts: number[];
  sum: number;
  count: number;
}

export interface TimerResult {
  durationMs: number;
  startTime: Date;
  endTime: Date;
}

export interface MetricsCollectorConfig {
  /** Most recent entries kept for inspection; counters and histograms are unaffected */
  maxEntries: number;
  defaultTags: Record<string, string>;
}

export const defaultMetricsConfig: MetricsCollectorConfig = {
  maxEntries: 1000,
  defaultTags: {},
};

/**
 * Metric names emitted by the rule engine
 */
export const MetricNames = {
  EVALUATION_LATENCY: 'observer_evaluation_latency_ms',
  EVALUATION_COUNT: 'observer_evaluation_count',
  FALLBACK_COUNT: 'observer_fallback_count',
  RULE_FAILURE_COUNT: 'observer_rule_failure_count',
  RULE_SKIPPED_COUNT: 'observer_rule_skipped_count',
  STATE_WRITE_COUNT: 'observer_state_write_count',
  STATE_WRITE_FAILURE_COUNT: 'observer_state_write_failure_count',
} as const;

/**
 * Default histogram buckets for latency metrics (in milliseconds)
 */
export const DEFAULT_LATENCY_BUCKETS = [1, 5, 10, 25, 50, 100, 250, 500, 1000, 2500];

export class MetricsCollector {
  private config: MetricsCollectorConfig;
  private counters: Map<string, number> = new Map();
  private histograms: Map<string, HistogramBuckets> = new Map();
  private metricEntries: MetricEntry[] = [];

  constructor(config: Partial<MetricsCollectorConfig> = {}) {
    this.config = { ...defaultMetricsConfig, ...config };
  }

  /**
   * Most recent metric entries, oldest first (for testing)
   */
  getMetricEntries(): MetricEntry[] {
    return [...this.metricEntries];
  }

  clear(): void {
    this.counters.clear();
    this.histograms.clear();
    this.metricEntries = [];
  }

  private createMetricKey(name: string, tags: Record<string, string>): string {
    const sortedTags = Object.entries(tags)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return sortedTags ? `${name}:${sortedTags}` : name;
  }

  private recordEntry(name: string, type: MetricType, value: number, tags: Record<string, string>): void {
    const entry: MetricEntry = {
      name,
      type,
      value,
      timestamp: new Date(),
      tags: { ...this.config.defaultTags, ...tags },
    };

    this.metricEntries.push(entry);
    if (this.metricEntries.length > this.config.maxEntries) {
      this.metricEntries.splice(0, this.metricEntries.length - this.config.maxEntries);
    }
  }

  incrementCounter(name: string, value = 1, tags: Record<string, string> = {}): void {
    const key = this.createMetricKey(name, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
    this.recordEntry(name, MetricType.COUNTER, value, tags);
  }

  getCounter(name: string, tags: Record<string, string> = {}): number {
    return this.counters.get(this.createMetricKey(name, tags)) ?? 0;
  }

  recordHistogram(
    name: string,
    value: number,
    tags: Record<string, string> = {},
    buckets: number[] = DEFAULT_LATENCY_BUCKETS
  ): void {
    const key = this.createMetricKey(name, tags);

    let histogram = this.histograms.get(key);
    if (!histogram) {
      histogram = {
        boundaries: buckets,
        counts: new Array<number>(buckets.length + 1).fill(0),
        sum: 0,
        count: 0,
      };
      this.histograms.set(key, histogram);
    }

    // Values above the last boundary land in the overflow bucket
    const index = histogram.boundaries.findIndex((boundary) => value <= boundary);
    const bucketIndex = index === -1 ? histogram.boundaries.length : index;

    histogram.counts[bucketIndex] = (histogram.counts[bucketIndex] ?? 0) + 1;
    histogram.sum += value;
    histogram.count++;

    this.recordEntry(name, MetricType.HISTOGRAM, value, tags);
  }

  getHistogram(name: string, tags: Record<string, string> = {}): HistogramBuckets | undefined {
    return this.histograms.get(this.createMetricKey(name, tags));
  }

  /**
   * Starts a timer and returns a function to stop it
   */
  startTimer(): () => TimerResult {
    const startTime = new Date();

    return () => {
      const endTime = new Date();
      return {
        durationMs: endTime.getTime() - startTime.getTime(),
        startTime,
        endTime,
      };
    };
  }

  /**
   * Records one observer evaluation with its outcome
   */
  recordEvaluation(outcome: string, durationMs: number): void {
    this.incrementCounter(MetricNames.EVALUATION_COUNT, 1, { outcome });
    this.recordHistogram(MetricNames.EVALUATION_LATENCY, durationMs, { outcome });
  }

  recordFallback(reason: string): void {
    this.incrementCounter(MetricNames.FALLBACK_COUNT, 1, { reason });
  }

  recordRuleFailure(ruleName: string): void {
    this.incrementCounter(MetricNames.RULE_FAILURE_COUNT, 1, { rule: ruleName });
  }

  recordRuleSkipped(ruleName: string): void {
    this.incrementCounter(MetricNames.RULE_SKIPPED_COUNT, 1, { rule: ruleName });
  }

  recordStateWrite(success: boolean): void {
    this.incrementCounter(success ? MetricNames.STATE_WRITE_COUNT : MetricNames.STATE_WRITE_FAILURE_COUNT);
  }

  getSummary(): Record<string, unknown> {
    const histograms: Record<string, unknown> = {};

    for (const [key, histogram] of this.histograms) {
      histograms[key] = {
        count: histogram.count,
        sum: histogram.sum,
        average: histogram.count > 0 ? histogram.sum / histogram.count : 0,
        buckets: histogram.boundaries.map((boundary, i) => ({
          le: boundary,
          count: histogram.counts[i] ?? 0,
        })),
      };
    }

    return {
      counters: Object.fromEntries(this.counters),
      histograms,
    };
  }
}
