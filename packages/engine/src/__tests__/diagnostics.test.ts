import { afterEach, describe, expect, test, vi } from "vitest";
import { createLogger } from "../diagnostics/logger";
import { createMetricsRegistry, createRetrievalMetrics } from "../diagnostics/metrics";

afterEach(() => {
	vi.restoreAllMocks();
});

describe("logger", () => {
	test("filters by level and redacts secrets", () => {
		const logger = createLogger({ console: false, storeEntries: true, level: "warn" });

		logger.info("ignored");
		logger.warn("Vector search degraded", { apiKey: "test-key", stage: "vector" });

		const entries = logger.getEntries();
		expect(entries).toHaveLength(1);
		expect(entries[0]).toMatchObject({
			level: "warn",
			message: "Vector search degraded",
			context: { apiKey: "[redacted]", stage: "vector" },
		});
	});

	test("children add context and share level and entries", () => {
		const logger = createLogger({ console: false, storeEntries: true });
		const child = logger.child({ component: "rerank" });

		child.setLevel("debug");
		logger.debug("from parent");
		child.error("Rerank failed", new Error("model overloaded"));

		const [parentEntry, childEntry] = logger.getEntries();
		expect(parentEntry.message).toBe("from parent");
		expect(childEntry.context).toEqual({ component: "rerank" });
		expect(childEntry.error?.message).toBe("model overloaded");
	});

	test("keeps only the newest entries", () => {
		const logger = createLogger({ console: false, storeEntries: true, maxEntries: 2 });

		logger.info("one");
		logger.info("two");
		logger.info("three");

		expect(logger.getEntries().map((entry) => entry.message)).toEqual(["two", "three"]);
		logger.clear();
		expect(logger.getEntries()).toEqual([]);
	});

	test("writes prefixed lines to the console", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		const logger = createLogger();

		logger.warn("slow", { ms: 5 });

		expect(warn).toHaveBeenCalledTimes(1);
		expect(warn.mock.calls[0][0]).toMatch(/ \[retrieval\] \[WARN\] slow \{"ms":5\}$/);
	});
});

describe("metrics", () => {
	test("histograms bucket observations", () => {
		const registry = createMetricsRegistry({ bucketsMs: [10, 100] });
		const histogram = registry.histogram("stage_ms");

		for (const value of [5, 50, 50, 500]) histogram.observe(value);

		expect(histogram.getStats()).toEqual({
			count: 4,
			sumMs: 605,
			maxMs: 500,
			p50Ms: 100,
			p95Ms: Number.POSITIVE_INFINITY,
			buckets: [
				{ le: 10, count: 1 },
				{ le: 100, count: 3 },
			],
		});
	});

	test("timers record elapsed milliseconds", () => {
		vi.spyOn(performance, "now").mockReturnValueOnce(100).mockReturnValueOnce(142.5);
		const registry = createMetricsRegistry();

		const stop = registry.timer("search_ms").start();

		expect(stop()).toBe(42.5);
		expect(registry.histogram("search_ms").getStats()).toMatchObject({ count: 1, sumMs: 42.5, p50Ms: 50 });
	});

	test("snapshot and reset", () => {
		const metrics = createRetrievalMetrics();

		metrics.searchesExecuted.inc();
		metrics.cacheEvictions.add(3);
		metrics.cacheEntries.set(7);

		const snapshot = metrics.registry.snapshot();
		expect(snapshot.counters.searches_total).toBe(1);
		expect(snapshot.counters.cache_evictions_total).toBe(3);
		expect(snapshot.gauges).toEqual({ cache_entries: 7 });
		expect(snapshot.histograms.stage_rerank_ms.count).toBe(0);

		metrics.registry.reset();
		expect(metrics.searchesExecuted.get()).toBe(0);
		expect(metrics.cacheEntries.get()).toBe(7);
	});

	test("the same name returns the same metric", () => {
		const registry = createMetricsRegistry();
		registry.counter("hits").inc();
		registry.counter("hits").inc();
		expect(registry.counter("hits").get()).toBe(2);
	});
});
