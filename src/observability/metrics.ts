/**
 * Metrics collection for derived queries
 */

export interface MetricsCollector {
  incrementCounter(name: string, value?: number, labels?: Record<string, string>): void;
  recordHistogram(name: string, value: number, labels?: Record<string, string>): void;
}

/**
 * Standard metric names
 */
export const RepositoryMetricNames = {
  /** Derived query executions, labelled by method and access path */
  QUERIES_TOTAL: 'repository_queries_total',
  /** Storage calls, labelled by operation and table */
  STORAGE_CALLS_TOTAL: 'repository_storage_calls_total',
  /** Pages fetched by a query or scan */
  PAGES_FETCHED: 'repository_pages_fetched_total',
  /** Items handed back to callers */
  ITEMS_RETURNED: 'repository_items_returned',
  ERRORS: 'repository_errors_total',
} as const;

export interface HistogramSummary {
  count: number;
  sum: number;
  min: number;
  max: number;
}

/**
 * In-memory metrics collector for testing and development
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private counters: Map<string, number> = new Map();
  private histograms: Map<string, number[]> = new Map();

  incrementCounter(name: string, value: number = 1, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    const current = this.counters.get(key) ?? 0;
    this.counters.set(key, current + value);
  }

  recordHistogram(name: string, value: number, labels?: Record<string, string>): void {
    const key = this.makeKey(name, labels);
    const values = this.histograms.get(key) ?? [];
    values.push(value);
    this.histograms.set(key, values);
  }

  /**
   * Get a specific counter value
   */
  getCounter(name: string, labels?: Record<string, string>): number {
    return this.counters.get(this.makeKey(name, labels)) ?? 0;
  }

  /**
   * Summarize a histogram, or undefined if nothing was recorded
   */
  getHistogram(name: string, labels?: Record<string, string>): HistogramSummary | undefined {
    const values = this.histograms.get(this.makeKey(name, labels));
    if (!values || values.length === 0) {
      return undefined;
    }
    return {
      count: values.length,
      sum: values.reduce((a, b) => a + b, 0),
      min: Math.min(...values),
      max: Math.max(...values),
    };
  }

  /**
   * Reset all metrics
   */
  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }

  private makeKey(name: string, labels?: Record<string, string>): string {
    if (!labels || Object.keys(labels).length === 0) {
      return name;
    }
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return `${name}:${labelStr}`;
  }
}

/**
 * No-op metrics collector
 */
export class NoopMetricsCollector implements MetricsCollector {
  incrementCounter(_name: string, _value?: number, _labels?: Record<string, string>): void {
    // No-op
  }

  recordHistogram(_name: string, _value: number, _labels?: Record<string, string>): void {
    // No-op
  }
}
