/**
 * Diagnostics module exports
 */

export {
	createLogger,
	nullLogger,
	type Logger,
	type LogLevel,
	type LogEntry,
	type LogContext,
	type LoggerOptions,
} from "./logger";

export {
	createMetricsRegistry,
	createRetrievalMetrics,
	DEFAULT_LATENCY_BUCKETS_MS,
	type MetricsRegistry,
	type MetricsRegistryOptions,
	type MetricsSnapshot,
	type Counter,
	type Gauge,
	type Histogram,
	type HistogramStats,
	type Timer,
	type RetrievalMetrics,
} from "./metrics";
