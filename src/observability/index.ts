/**
 * Observability
 *
 * Logging and metrics for repository construction and query execution.
 */

export type { Logger, LogLevel, LogContext } from './logging.js';
export { ConsoleLogger, NoopLogger, isLogLevel, logError } from './logging.js';
export type { MetricsCollector, HistogramSummary } from './metrics.js';
export { RepositoryMetricNames, InMemoryMetricsCollector, NoopMetricsCollector } from './metrics.js';
