/**
 * Metrics for @hybrid-retrieval/engine
 *
 * In-process counters, gauges and latency histograms with fixed millisecond
 * buckets. Nothing is exported over the network; `snapshot()` is the read side.
 */

export interface Counter {
	inc(): void;
	add(amount: number): void;
	get(): number;
}

export interface Gauge {
	set(value: number): void;
	get(): number;
}

export interface Histogram {
	observe(valueMs: number): void;
	getStats(): HistogramStats;
}

export interface HistogramStats {
	count: number;
	sumMs: number;
	maxMs: number;
	/** Upper bound of the bucket holding the median (Infinity past the last bucket) */
	p50Ms: number;
	p95Ms: number;
	/** Observation count per bucket upper bound, cumulative */
	buckets: Array<{ le: number; count: number }>;
}

export interface Timer {
	/** Returns a stop function that records and returns the elapsed ms */
	start(): () => number;
}

export interface MetricsSnapshot {
	counters: Record<string, number>;
	gauges: Record<string, number>;
	histograms: Record<string, HistogramStats>;
}

export interface MetricsRegistry {
	counter(name: string): Counter;
	gauge(name: string): Gauge;
	histogram(name: string): Histogram;
	timer(name: string): Timer;
	snapshot(): MetricsSnapshot;
	/** Zero counters and histograms; gauges describe current state and are kept */
	reset(): void;
}

export interface MetricsRegistryOptions {
	/** Histogram bucket upper bounds in ms, ascending (default: 5 ms to 5 s) */
	bucketsMs?: readonly number[];
}

export const DEFAULT_LATENCY_BUCKETS_MS: readonly number[] = [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000];

// ============================================================================
// Primitives
// ============================================================================

interface Resettable {
	reset(): void;
}

function createCounter(): Counter & Resettable {
	let value = 0;
	return {
		inc: () => {
			value += 1;
		},
		add: (amount) => {
			value += amount;
		},
		get: () => value,
		reset: () => {
			value = 0;
		},
	};
}

function createGauge(): Gauge {
	let value = 0;
	return {
		set: (next) => {
			value = next;
		},
		get: () => value,
	};
}

function createHistogram(bounds: readonly number[]): Histogram & Resettable {
	// counts[i] holds observations <= bounds[i]; the extra slot is the overflow
	let counts = new Array<number>(bounds.length + 1).fill(0);
	let total = 0;
	let sum = 0;
	let max = 0;

	function quantile(q: number): number {
		const target = Math.ceil(q * total);
		let seen = 0;
		for (let i = 0; i < counts.length; i++) {
			seen += counts[i];
			if (seen >= target) return i < bounds.length ? bounds[i] : Number.POSITIVE_INFINITY;
		}
		return Number.POSITIVE_INFINITY;
	}

	return {
		observe(valueMs) {
			let slot = bounds.findIndex((bound) => valueMs <= bound);
			if (slot === -1) slot = bounds.length;
			counts[slot] += 1;
			total += 1;
			sum += valueMs;
			max = Math.max(max, valueMs);
		},

		getStats() {
			let cumulative = 0;
			const buckets = bounds.map((le, i) => {
				cumulative += counts[i];
				return { le, count: cumulative };
			});
			return {
				count: total,
				sumMs: sum,
				maxMs: max,
				p50Ms: total === 0 ? 0 : quantile(0.5),
				p95Ms: total === 0 ? 0 : quantile(0.95),
				buckets,
			};
		},

		reset() {
			counts = new Array<number>(bounds.length + 1).fill(0);
			total = 0;
			sum = 0;
			max = 0;
		},
	};
}

// ============================================================================
// Registry
// ============================================================================

export function createMetricsRegistry(options: MetricsRegistryOptions = {}): MetricsRegistry {
	const bounds = options.bucketsMs ?? DEFAULT_LATENCY_BUCKETS_MS;
	const counters = new Map<string, Counter & Resettable>();
	const gauges = new Map<string, Gauge>();
	const histograms = new Map<string, Histogram & Resettable>();

	function named<T>(store: Map<string, T>, name: string, create: () => T): T {
		const existing = store.get(name);
		if (existing) return existing;
		const created = create();
		store.set(name, created);
		return created;
	}

	const registry: MetricsRegistry = {
		counter: (name) => named(counters, name, createCounter),
		gauge: (name) => named(gauges, name, createGauge),
		histogram: (name) => named(histograms, name, () => createHistogram(bounds)),

		timer(name) {
			const histogram = registry.histogram(name);
			return {
				start() {
					const startedAt = performance.now();
					return () => {
						const elapsed = performance.now() - startedAt;
						histogram.observe(elapsed);
						return elapsed;
					};
				},
			};
		},

		snapshot() {
			const snapshot: MetricsSnapshot = { counters: {}, gauges: {}, histograms: {} };
			for (const [name, counter] of counters) snapshot.counters[name] = counter.get();
			for (const [name, gauge] of gauges) snapshot.gauges[name] = gauge.get();
			for (const [name, histogram] of histograms) snapshot.histograms[name] = histogram.getStats();
			return snapshot;
		},

		reset() {
			for (const counter of counters.values()) counter.reset();
			for (const histogram of histograms.values()) histogram.reset();
		},
	};

	return registry;
}

// ============================================================================
// Engine metrics
// ============================================================================

export interface RetrievalMetrics {
	searchesExecuted: Counter;
	searchDuration: Timer;
	/** Responses returned with at least one degraded flag */
	degradedResponses: Counter;
	fatalErrors: Counter;
	validationErrors: Counter;

	vectorDuration: Timer;
	keywordDuration: Timer;
	graphDuration: Timer;
	rerankDuration: Timer;
	backendRetries: Counter;

	cacheHits: Counter;
	cacheMisses: Counter;
	/** Callers that joined an in-flight computation */
	cacheJoins: Counter;
	/** Entries removed by expiry, capacity or invalidation */
	cacheEvictions: Counter;
	cacheEntries: Gauge;

	registry: MetricsRegistry;
}

export function createRetrievalMetrics(options: MetricsRegistryOptions = {}): RetrievalMetrics {
	const registry = createMetricsRegistry(options);

	return {
		searchesExecuted: registry.counter("searches_total"),
		searchDuration: registry.timer("search_ms"),
		degradedResponses: registry.counter("searches_degraded_total"),
		fatalErrors: registry.counter("searches_failed_total"),
		validationErrors: registry.counter("requests_rejected_total"),

		vectorDuration: registry.timer("stage_vector_ms"),
		keywordDuration: registry.timer("stage_keyword_ms"),
		graphDuration: registry.timer("stage_graph_ms"),
		rerankDuration: registry.timer("stage_rerank_ms"),
		backendRetries: registry.counter("backend_retries_total"),

		cacheHits: registry.counter("cache_hits_total"),
		cacheMisses: registry.counter("cache_misses_total"),
		cacheJoins: registry.counter("cache_joins_total"),
		cacheEvictions: registry.counter("cache_evictions_total"),
		cacheEntries: registry.gauge("cache_entries"),

		registry,
	};
}
