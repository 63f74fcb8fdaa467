/**
 * Keyword Search - BM25 over the keyword index's term statistics
 */

import { nullLogger, type Logger } from "../diagnostics/logger";
import type { RetrievalMetrics } from "../diagnostics/metrics";
import { uniqueTerms } from "../text/tokenizer";
import type { CorpusStats, KeywordIndex, SearchHit, SearchPlan, TermMatch } from "../types";
import { callBackend, degradeOnFailure, type RetryPolicy, type StageResult } from "./backend-call";

// ============================================================================
// Types
// ============================================================================

export interface BM25Params {
	/** Term frequency saturation (default: 1.2) */
	k1: number;
	/** Length normalization (default: 0.75) */
	b: number;
}

export const DEFAULT_BM25_PARAMS: BM25Params = { k1: 1.2, b: 0.75 };

export interface KeywordSearcherDeps {
	index: KeywordIndex;
	retry: RetryPolicy;
	bm25?: BM25Params;
	logger?: Logger;
	metrics?: RetrievalMetrics;
}

export interface KeywordSearcher {
	/**
	 * Hits ordered by BM25 score desc, ties by chunk id. Backend failures
	 * degrade to an empty list; aborts reject.
	 */
	search(query: string, plan: SearchPlan, signal?: AbortSignal): Promise<StageResult<SearchHit[]>>;
}

// ============================================================================
// Pure Functions
// ============================================================================

/**
 * IDF(t) = ln(1 + (N - n + 0.5) / (n + 0.5)); never negative.
 */
export function inverseDocumentFrequency(totalChunks: number, documentFrequency: number): number {
	return Math.log(1 + (totalChunks - documentFrequency + 0.5) / (documentFrequency + 0.5));
}

export function bm25Score(
	match: TermMatch,
	corpus: CorpusStats,
	terms: readonly string[],
	params: BM25Params = DEFAULT_BM25_PARAMS,
): number {
	const { k1, b } = params;
	const avgLength = corpus.averageLength > 0 ? corpus.averageLength : 1;
	const lengthNorm = 1 - b + b * (match.length / avgLength);

	let score = 0;
	for (const term of terms) {
		const tf = match.frequencies[term] ?? 0;
		if (tf === 0) continue;
		const idf = inverseDocumentFrequency(corpus.totalChunks, corpus.documentFrequencies[term] ?? 0);
		score += idf * ((tf * (k1 + 1)) / (tf + k1 * lengthNorm));
	}
	return score;
}

export function compareHits(a: SearchHit, b: SearchHit): number {
	if (b.rawScore !== a.rawScore) return b.rawScore - a.rawScore;
	return a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0;
}

// ============================================================================
// Implementation
// ============================================================================

export function createKeywordSearcher(deps: KeywordSearcherDeps): KeywordSearcher {
	const { index, retry, bm25 = DEFAULT_BM25_PARAMS, metrics } = deps;
	const log = (deps.logger ?? nullLogger).child({ component: "keyword-search" });

	return {
		async search(query, plan, signal) {
			const terms = uniqueTerms(query);
			if (terms.length === 0) return { value: [], degraded: false };

			const stop = metrics?.keywordDuration.start();
			try {
				return await degradeOnFailure(
					"Keyword search",
					async () => {
						const { matches, corpus } = await callBackend(
							"keyword-index",
							(s) => index.query(terms, { filters: plan.filters, signal: s }),
							{ retry, logger: log, metrics, signal },
						);

						return matches
							.map((match): SearchHit => ({
								chunkId: match.chunkId,
								rawScore: bm25Score(match, corpus, terms, bm25),
								source: "keyword",
							}))
							.filter((hit) => hit.rawScore > 0)
							.sort(compareHits)
							.slice(0, plan.candidateLimit);
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
