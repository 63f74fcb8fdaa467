import { describe, expect, test, vi } from "vitest";
import { createCacheManager } from "../cache/cache-manager";
import type { Embedder } from "../embeddings/embedder";
import { createVectorSearcher, EMBEDDING_CACHE_NAMESPACE } from "../query/vector-search";
import type { VectorIndex } from "../types";
import { FAST_RETRY, makePlan, NO_RETRY } from "./fixtures";

function fakeEmbedder(modelId = "fake-model@3") {
	const embed = vi.fn<Embedder["embed"]>(async () => [1, 0, 0]);
	const embedder: Embedder = {
		embed,
		embedBatch: async (texts) => texts.map(() => [1, 0, 0]),
		dimension: 3,
		modelId,
	};
	return { embedder, embed };
}

function fakeIndex() {
	return {
		query: vi.fn<VectorIndex["query"]>(async () => [
			{ chunkId: "a", similarity: 0.92 },
			{ chunkId: "b", similarity: 0.4 },
		]),
	};
}

describe("vector searcher", () => {
	test("maps similarities to vector hits and passes plan limits and signal through", async () => {
		const { embedder, embed } = fakeEmbedder();
		const index = fakeIndex();
		const searcher = createVectorSearcher({ index, embedder, retry: NO_RETRY });
		const plan = makePlan({ candidateLimit: 7, filters: { source: "wiki" } });
		const controller = new AbortController();

		const result = await searcher.search("test query", plan, controller.signal);

		expect(result).toEqual({
			value: [
				{ chunkId: "a", rawScore: 0.92, source: "vector" },
				{ chunkId: "b", rawScore: 0.4, source: "vector" },
			],
			degraded: false,
		});
		expect(embed).toHaveBeenCalledWith("test query", expect.objectContaining({ inputType: "query" }));
		expect(index.query).toHaveBeenCalledWith([1, 0, 0], 7, { source: "wiki" }, controller.signal);
	});

	test("query embeddings are computed once through the cache", async () => {
		const cache = createCacheManager();
		const embeddingCache = cache.region<number[]>(EMBEDDING_CACHE_NAMESPACE);
		const { embedder, embed } = fakeEmbedder();
		const searcher = createVectorSearcher({ index: fakeIndex(), embedder, embeddingCache, retry: NO_RETRY });

		await Promise.all([
			searcher.search("same text", makePlan()),
			searcher.search("same text", makePlan()),
		]);
		await searcher.search("same text", makePlan());
		await searcher.search("other text", makePlan());

		expect(embed).toHaveBeenCalledTimes(2);
		expect(embeddingCache.size).toBe(2);
	});

	test("a different embedding model does not reuse cached vectors", async () => {
		const cache = createCacheManager();
		const embeddingCache = cache.region<number[]>(EMBEDDING_CACHE_NAMESPACE);
		const first = fakeEmbedder("model-a");
		const second = fakeEmbedder("model-b");

		await createVectorSearcher({ index: fakeIndex(), embedder: first.embedder, embeddingCache, retry: NO_RETRY }).search(
			"q",
			makePlan(),
		);
		await createVectorSearcher({ index: fakeIndex(), embedder: second.embedder, embeddingCache, retry: NO_RETRY }).search(
			"q",
			makePlan(),
		);

		expect(first.embed).toHaveBeenCalledTimes(1);
		expect(second.embed).toHaveBeenCalledTimes(1);
	});

	test("embedding provider failure degrades the path", async () => {
		const { embedder, embed } = fakeEmbedder();
		embed.mockRejectedValue(new Error("rate limited"));
		const index = fakeIndex();
		const searcher = createVectorSearcher({ index, embedder, retry: FAST_RETRY });

		const result = await searcher.search("q", makePlan());

		expect(embed).toHaveBeenCalledTimes(3);
		expect(index.query).not.toHaveBeenCalled();
		expect(result.degraded).toBe(true);
		expect(result.value).toEqual([]);
		expect(result.error?.backend).toBe("embedding-provider");
	});

	test("vector index failure degrades the path", async () => {
		const { embedder } = fakeEmbedder();
		const index = { query: vi.fn<VectorIndex["query"]>().mockRejectedValue(new Error("index offline")) };
		const searcher = createVectorSearcher({ index, embedder, retry: NO_RETRY });

		const result = await searcher.search("q", makePlan());

		expect(result.degraded).toBe(true);
		expect(result.error?.backend).toBe("vector-index");
		expect(result.error?.message).toBe("vector-index: index offline");
	});

	test("a failed embedding is not cached", async () => {
		const cache = createCacheManager();
		const embeddingCache = cache.region<number[]>(EMBEDDING_CACHE_NAMESPACE);
		const { embedder, embed } = fakeEmbedder();
		embed.mockRejectedValueOnce(new Error("timeout"));
		const searcher = createVectorSearcher({ index: fakeIndex(), embedder, embeddingCache, retry: NO_RETRY });

		expect((await searcher.search("q", makePlan())).degraded).toBe(true);
		expect((await searcher.search("q", makePlan())).degraded).toBe(false);
		expect(embed).toHaveBeenCalledTimes(2);
	});
});
