/**
 * Vector Search - dense similarity retrieval
 *
 * Query embeddings come through the cache manager (keyed by query text and
 * embedding model), so repeated and concurrent identical queries embed once.
 */

import { deriveCacheKey } from "../cache/cache-key";
import type { CacheRegion } from "../cache/cache-manager";
import { nullLogger, type Logger } from "../diagnostics/logger";
import type { RetrievalMetrics } from "../diagnostics/metrics";
import type { Embedder } from "../embeddings/embedder";
import type { SearchHit, SearchPlan, VectorIndex } from "../types";
import { callBackend, degradeOnFailure, type RetryPolicy, type StageResult } from "./backend-call";

// ============================================================================
// Types
// ============================================================================

export const EMBEDDING_CACHE_NAMESPACE = "embedding";

export interface VectorSearcherDeps {
	index: VectorIndex;
	embedder: Embedder;
	/** Query embedding cache; embeddings are computed per call without one */
	embeddingCache?: CacheRegion<number[]>;
	retry: RetryPolicy;
	logger?: Logger;
	metrics?: RetrievalMetrics;
}

export interface VectorSearcher {
	/**
	 * Hits ordered by similarity. Backend failures degrade to an empty list;
	 * aborts reject.
	 */
	search(query: string, plan: SearchPlan, signal?: AbortSignal): Promise<StageResult<SearchHit[]>>;
}

// ============================================================================
// Implementation
// ============================================================================

export function createVectorSearcher(deps: VectorSearcherDeps): VectorSearcher {
	const { index, embedder, embeddingCache, retry, metrics } = deps;
	const log = (deps.logger ?? nullLogger).child({ component: "vector-search" });

	function computeEmbedding(query: string, signal?: AbortSignal): Promise<number[]> {
		return callBackend(
			"embedding-provider",
			(s) => embedder.embed(query, { inputType: "query", signal: s }),
			{ retry, logger: log, metrics, signal },
		);
	}

	async function embedQuery(query: string, signal?: AbortSignal): Promise<number[]> {
		if (!embeddingCache) return computeEmbedding(query, signal);

		const key = deriveCacheKey(EMBEDDING_CACHE_NAMESPACE, embedder.modelId, query);
		// The shared computation is cancelled by the cache once no caller is waiting for it
		return embeddingCache.getOrCompute(key, (shared) => computeEmbedding(query, shared), { signal });
	}

	return {
		async search(query, plan, signal) {
			const stop = metrics?.vectorDuration.start();
			try {
				return await degradeOnFailure(
					"Vector search",
					async () => {
						const embedding = await embedQuery(query, signal);
						const matches = await callBackend(
							"vector-index",
							(s) => index.query(embedding, plan.candidateLimit, plan.filters, s),
							{ retry, logger: log, metrics, signal },
						);
						return matches.map(
							(match): SearchHit => ({ chunkId: match.chunkId, rawScore: match.similarity, source: "vector" }),
						);
					},
					[],
					log,
				);
			} finally {
				stop?.();
			}
		},
	};
}
