import { createMemoryGraphStore, type MemoryGraphStore } from "@hybrid-retrieval/knowledge-graph";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { type EngineConfigInput, parseConfig } from "../config";
import { createRetrievalMetrics, type RetrievalMetrics } from "../diagnostics/metrics";
import type { Embedder } from "../embeddings/embedder";
import { FatalPipelineError, ValidationError } from "../errors";
import { buildTermStats, createIngestionWriter, type IngestionWriter } from "../ingestion/ingest";
import { createSearchEngine, type SearchEngine } from "../query/search-engine";
import { createChunkStore } from "../storage/chunk-store";
import { createKeywordIndex } from "../storage/keyword-index";
import { getRevision, openDatabase, type RetrievalDatabase } from "../storage/schema";
import { createVectorIndex } from "../storage/vector-index";
import type { Chunk, KeywordIndex } from "../types";
import { NO_RETRY } from "./fixtures";

// ============================================================================
// Fixtures
// ============================================================================

function chunk(id: string, documentId: string, text: string, embedding: number[]): Chunk {
	return { id, documentId, text, embedding, termStats: buildTermStats(text), metadata: {}, position: 0 };
}

// c3 has no embedding, so only keyword search or the graph can reach it
const CORPUS: Chunk[] = [
	chunk("c1", "doc1", "Reciprocal rank fusion merges ranked lists", [1, 0, 0]),
	chunk("c2", "doc1", "Dense vectors capture meaning", [0, 1, 0]),
	chunk("c3", "doc2", "Keyword search uses inverted postings", []),
];

const QUERY = { query: "rank fusion lists", searchType: "hybrid", rerank: false } as const;

function fakeEmbedder(embed: Embedder["embed"]) {
	return {
		dimension: 3,
		modelId: "fake-embedder@3",
		embed: vi.fn(embed),
		async embedBatch(texts: string[]) {
			return texts.map(() => [1, 0, 0]);
		},
	};
}

function never<T>(): Promise<T> {
	return new Promise<T>(() => {});
}

function deferred() {
	let resolve: () => void = () => {};
	const promise = new Promise<void>((res) => {
		resolve = res;
	});
	return { promise, resolve };
}

// ============================================================================
// Tests
// ============================================================================

describe("search engine", () => {
	let db: RetrievalDatabase;
	let writer: IngestionWriter;
	let graph: MemoryGraphStore;
	let metrics: RetrievalMetrics;
	let engine: SearchEngine | undefined;

	beforeEach(() => {
		db = openDatabase();
		graph = createMemoryGraphStore();
		graph.addRelation({ from: "rrf", to: "bm25", relation: "related_to" });
		writer = createIngestionWriter(db, { graph });
		writer.write(CORPUS, { entityLinks: { c1: ["rrf"], c3: ["bm25"] } });
		metrics = createRetrievalMetrics();
	});

	afterEach(() => {
		engine?.stop();
		engine = undefined;
		db.close();
	});

	function build(
		embedder: Embedder,
		overrides: {
			config?: EngineConfigInput;
			keywordIndex?: KeywordIndex;
			withGraph?: boolean;
			trackRevision?: boolean;
		} = {},
	): SearchEngine {
		const built = createSearchEngine({
			vectorIndex: createVectorIndex(db),
			keywordIndex: overrides.keywordIndex ?? createKeywordIndex(db),
			chunks: createChunkStore(db),
			embedder,
			graph: overrides.withGraph ? graph : undefined,
			indexRevision: overrides.trackRevision ? () => getRevision(db) : undefined,
			config: parseConfig({ retry: NO_RETRY, ...overrides.config }),
			metrics,
		});
		writer.subscribe((event) => {
			built.handleDocumentEvent(event);
		});
		engine = built;
		return built;
	}

	test("hybrid search fuses vector and keyword hits", async () => {
		const search = build(fakeEmbedder(async () => [1, 0, 0]));

		const response = await search.search(QUERY);

		expect(response.results.map((item) => [item.chunkId, item.sources])).toEqual([
			["c1", ["vector", "keyword"]],
			["c2", ["vector"]],
		]);
		expect(response.results[0].content).toBe("Reciprocal rank fusion merges ranked lists");
		expect(response.totalCandidates).toBe(2);
		expect(response.degradedFlags).toEqual([]);
		expect(response.cached).toBe(false);
		expect(metrics.searchesExecuted.get()).toBe(1);
	});

	test("a failing embedder degrades to keyword results", async () => {
		const embedder = fakeEmbedder(async () => {
			throw new Error("provider unavailable");
		});
		const search = build(embedder);

		const first = await search.search(QUERY);
		const second = await search.search(QUERY);

		expect(first.results.map((item) => [item.chunkId, item.sources])).toEqual([["c1", ["keyword"]]]);
		expect(first.degradedFlags).toEqual(["vector"]);
		// degraded responses are never served from the cache
		expect(second.cached).toBe(false);
		expect(embedder.embed).toHaveBeenCalledTimes(2);
		expect(metrics.degradedResponses.get()).toBe(2);
	});

	test("every planned path failing is fatal", async () => {
		const failingIndex: KeywordIndex = {
			async query() {
				throw new Error("postings unavailable");
			},
		};
		const search = build(
			fakeEmbedder(async () => {
				throw new Error("provider unavailable");
			}),
			{ keywordIndex: failingIndex },
		);

		const error = await search.search(QUERY).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(FatalPipelineError);
		expect(error).toMatchObject({
			failures: [{ backend: "embedding-provider" }, { backend: "keyword-index" }],
		});
		expect(metrics.fatalErrors.get()).toBe(1);
	});

	test("keyword-only search fails when its only path fails", async () => {
		const failingIndex: KeywordIndex = {
			async query() {
				throw new Error("postings unavailable");
			},
		};
		const embedder = fakeEmbedder(async () => [1, 0, 0]);
		const search = build(embedder, { keywordIndex: failingIndex });

		await expect(search.search({ query: "rank", searchType: "keyword" })).rejects.toThrow(FatalPipelineError);
		expect(embedder.embed).not.toHaveBeenCalled();
	});

	test("malformed requests are validation errors", async () => {
		const search = build(fakeEmbedder(async () => [1, 0, 0]));

		await expect(search.search({ query: "   " })).rejects.toThrow(ValidationError);
		expect(metrics.validationErrors.get()).toBe(1);
	});

	test("repeated queries are served from the result cache", async () => {
		const embedder = fakeEmbedder(async () => [1, 0, 0]);
		const search = build(embedder);

		const first = await search.search(QUERY);
		const second = await search.search(QUERY);

		expect(second.cached).toBe(true);
		expect(second.results).toEqual(first.results);
		expect(embedder.embed).toHaveBeenCalledTimes(1);
	});

	test("a document update drops cached results that include it", async () => {
		const search = build(fakeEmbedder(async () => [1, 0, 0]));
		await search.search(QUERY);

		writer.write([chunk("c1", "doc1", "Reciprocal rank fusion, revised", [1, 0, 0])]);
		const after = await search.search(QUERY);

		expect(after.cached).toBe(false);
		expect(after.results.map((item) => item.chunkId)).toEqual(["c1"]);
		expect(after.results[0].content).toBe("Reciprocal rank fusion, revised");
	});

	test("documents ingested after a search show up in the next one", async () => {
		const search = build(fakeEmbedder(async () => [1, 0, 0]), { trackRevision: true });
		const request = { query: "inverted postings", searchType: "keyword", rerank: false } as const;

		const before = await search.search(request);
		writer.write([chunk("c4", "doc3", "Inverted postings list", [])]);
		const after = await search.search(request);

		expect(before.results.map((item) => item.chunkId)).toEqual(["c3"]);
		expect(after.cached).toBe(false);
		expect(after.results.map((item) => item.chunkId)).toEqual(["c4", "c3"]);
	});

	test("identical concurrent searches share one pipeline run", async () => {
		const index = createKeywordIndex(db);
		const query = vi.fn(async (terms: readonly string[], options?: Parameters<KeywordIndex["query"]>[1]) => {
			await new Promise((resolve) => setTimeout(resolve, 10));
			return index.query(terms, options);
		});
		const search = build(fakeEmbedder(async () => [1, 0, 0]), { keywordIndex: { query } });
		const request = { query: "rank fusion", searchType: "keyword" } as const;

		const responses = await Promise.all([search.search(request), search.search(request), search.search(request)]);

		expect(query).toHaveBeenCalledTimes(1);
		expect(responses.map((response) => response.results.map((item) => item.chunkId))).toEqual([["c1"], ["c1"], ["c1"]]);
		expect(responses.map((response) => response.cached)).toEqual([false, false, false]);
		expect((await search.search(request)).cached).toBe(true);
	});

	test("a document update during a search keeps that result out of the cache", async () => {
		const index = createKeywordIndex(db);
		const retrieved = deferred();
		const gate = deferred();
		const heldIndex: KeywordIndex = {
			async query(terms, options) {
				const result = await index.query(terms, options);
				retrieved.resolve();
				await gate.promise;
				return result;
			},
		};
		const search = build(fakeEmbedder(async () => [1, 0, 0]), { keywordIndex: heldIndex });
		const request = { query: "rank fusion", searchType: "keyword", rerank: false } as const;

		const inFlight = search.search(request);
		await retrieved.promise;
		writer.write([chunk("c1", "doc1", "Gamma delta notes", [1, 0, 0])]);
		gate.resolve();
		await inFlight;

		const after = await search.search(request);

		expect(after.cached).toBe(false);
		expect(after.results).toEqual([]);
	});

	test("callers cannot change what the cache serves", async () => {
		const search = build(fakeEmbedder(async () => [1, 0, 0]));

		const first = await search.search(QUERY);
		first.results.length = 0;
		const second = await search.search(QUERY);
		second.results[0].content = "edited by caller";
		const third = await search.search(QUERY);

		expect(second.cached).toBe(true);
		expect(second.results.map((item) => item.chunkId)).toEqual(["c1", "c2"]);
		expect(third.results[0].content).toBe("Reciprocal rank fusion merges ranked lists");
	});

	test("cancelling the only caller cancels the backend call", async () => {
		let seen: AbortSignal | undefined;
		const hangingIndex: KeywordIndex = {
			query(_terms, options) {
				seen = options?.signal;
				return never();
			},
		};
		const search = build(fakeEmbedder(async () => [1, 0, 0]), { keywordIndex: hangingIndex });
		const controller = new AbortController();

		const pending = search.search({ query: "rank", searchType: "keyword" }, { signal: controller.signal });
		await vi.waitFor(() => expect(seen).toBeDefined());
		controller.abort(new Error("user cancelled"));

		await expect(pending).rejects.toThrow("user cancelled");
		expect(seen?.aborted).toBe(true);
	});

	test("an aborted request rejects with the abort reason", async () => {
		const search = build(fakeEmbedder(() => never<number[]>()));
		const controller = new AbortController();
		const reason = new Error("user cancelled");

		const pending = search.search(QUERY, { signal: controller.signal });
		setTimeout(() => controller.abort(reason), 5);

		await expect(pending).rejects.toBe(reason);
	});

	test("an already aborted signal rejects before planning", async () => {
		const embedder = fakeEmbedder(async () => [1, 0, 0]);
		const search = build(embedder);
		const controller = new AbortController();
		controller.abort(new Error("gone"));

		await expect(search.search({ query: "   " }, { signal: controller.signal })).rejects.toThrow("gone");
		expect(embedder.embed).not.toHaveBeenCalled();
	});

	test("a branch that times out is degraded while the other completes", async () => {
		const search = build(
			fakeEmbedder(() => never<number[]>()),
			{ config: { timeouts: { queryMs: 20 } } },
		);

		const response = await search.search(QUERY);

		expect(response.degradedFlags).toEqual(["vector"]);
		expect(response.results.map((item) => item.chunkId)).toEqual(["c1"]);
	});

	test("graph expansion adds chunks linked through related entities", async () => {
		const search = build(fakeEmbedder(async () => [1, 0, 0]), {
			config: { graph: { enabled: true } },
			withGraph: true,
		});

		const response = await search.search({ query: "fusion", searchType: "vector", rerank: false });

		expect(response.results.map((item) => [item.chunkId, item.sources])).toEqual([
			["c1", ["vector"]],
			["c2", ["vector"]],
			["c3", ["graph"]],
		]);
		expect(response.degradedFlags).toEqual([]);
	});

	test("graph expansion stays off without the configuration flag", async () => {
		const search = build(fakeEmbedder(async () => [1, 0, 0]), { withGraph: true });

		const response = await search.search({ query: "fusion", searchType: "vector", rerank: false });

		expect(response.results.map((item) => item.chunkId)).toEqual(["c1", "c2"]);
	});

	test("reranking keeps the lexical best match on top", async () => {
		const search = build(fakeEmbedder(async () => [0, 1, 0]));

		const response = await search.search({ query: "rank fusion lists", searchType: "hybrid" });

		expect(response.results.map((item) => item.chunkId)).toEqual(["c1", "c2"]);
		expect(response.results[0].score).toBeGreaterThan(0);
		expect(response.degradedFlags).toEqual([]);
	});
});
