/**
 * Shared builders for engine tests
 */

import type { RetryPolicy } from "../query/backend-call";
import type { ChunkReader, ChunkRecord, FusedResult, HitSource, SearchHit, SearchPlan } from "../types";

export const NO_RETRY: RetryPolicy = { attempts: 1, baseDelayMs: 0, maxDelayMs: 0 };

export const FAST_RETRY: RetryPolicy = { attempts: 3, baseDelayMs: 0, maxDelayMs: 0 };

export function makePlan(overrides: Partial<SearchPlan> = {}): SearchPlan {
	return {
		query: "test query",
		searchType: "hybrid",
		topK: 10,
		candidateLimit: 20,
		filters: {},
		rerankEnabled: false,
		graphExpandEnabled: false,
		includeMetadata: true,
		...overrides,
	};
}

export function makeHits(source: HitSource, entries: Array<[string, number]>): SearchHit[] {
	return entries.map(([chunkId, rawScore]) => ({ chunkId, rawScore, source }));
}

/** Fused list in the given order, scores descending */
export function makeFused(chunkIds: string[]): FusedResult[] {
	return chunkIds.map((chunkId, index) => ({
		chunkId,
		fusedScore: 1 - index / (chunkIds.length + 1),
		rrfScore: 1 / (index + 61),
		sources: new Set<HitSource>(["vector"]),
		rank: index + 1,
		sourceRanks: { vector: index + 1 },
		normalizedScores: { vector: 1 },
	}));
}

export function makeChunk(id: string, text: string, overrides: Partial<ChunkRecord> = {}): ChunkRecord {
	return {
		id,
		documentId: `doc-${id}`,
		text,
		metadata: {},
		position: 0,
		...overrides,
	};
}

export function createMapChunkReader(chunks: ChunkRecord[]): ChunkReader {
	const byId = new Map(chunks.map((chunk) => [chunk.id, chunk]));
	return {
		async getChunks(ids) {
			const result = new Map<string, ChunkRecord>();
			for (const id of ids) {
				const chunk = byId.get(id);
				if (chunk) result.set(id, chunk);
			}
			return result;
		},
	};
}
