/**
 * Reranker - pairwise relevance scoring of the top fused candidates
 *
 * A RerankerService scores (query, document) pairs in one batch. The rerank
 * stage reorders scored items among the slots they occupied, leaves unscored
 * items in place and never changes the list length.
 */

import { nullLogger, type Logger } from "../diagnostics/logger";
import type { RetrievalMetrics } from "../diagnostics/metrics";
import { TransientBackendError } from "../errors";
import { tokenize } from "../text/tokenizer";
import type { ChunkReader, FusedResult, RankedResult, SearchPlan } from "../types";
import { callBackend, degradeOnFailure, type RetryPolicy, type StageResult } from "./backend-call";
import { DEFAULT_BM25_PARAMS, inverseDocumentFrequency, type BM25Params } from "./keyword-search";

// ============================================================================
// Types
// ============================================================================

export interface RerankerService {
	readonly name: string;

	/**
	 * One score per document, in input order. `null` marks a document the
	 * service could not score.
	 */
	score(query: string, documents: string[], signal?: AbortSignal): Promise<Array<number | null>>;
}

export interface RerankStageDeps {
	service: RerankerService;
	chunks: ChunkReader;
	/** Candidates sent to the service (default: 20) */
	topM?: number;
	retry: RetryPolicy;
	logger?: Logger;
	metrics?: RetrievalMetrics;
}

export interface RerankStage {
	/**
	 * Same items, same length. Service failure returns fusion order with
	 * `degraded: true`; partial scoring also sets the flag.
	 */
	rerank(
		query: string,
		fused: readonly FusedResult[],
		plan: SearchPlan,
		signal?: AbortSignal,
	): Promise<StageResult<RankedResult[]>>;
}

export const DEFAULT_RERANK_TOP_M = 20;

// ============================================================================
// Score handling
// ============================================================================

export function sigmoid(x: number): number {
	return 1 / (1 + Math.exp(-x));
}

/**
 * Scores already in [0, 1] are kept. Otherwise every score in the batch goes
 * through the logistic function, which keeps their relative order.
 */
export function normalizeRerankScores(scores: Array<number | null>): Array<number | null> {
	const outOfRange = scores.some((score) => score !== null && (score < 0 || score > 1));
	if (!outOfRange) return scores;
	return scores.map((score) => (score === null ? null : sigmoid(score)));
}

/**
 * Reorder scored items by score desc within the slots scored items occupy.
 * Unscored items keep their index. Ties keep the incoming order.
 */
export function applyRerankScores<T extends FusedResult>(
	items: readonly T[],
	scores: ReadonlyArray<number | null>,
): Array<T & { rerankScore?: number }> {
	const slots: number[] = [];
	const scored: Array<{ item: T; score: number; index: number }> = [];

	items.forEach((item, index) => {
		const score = scores[index];
		if (score === null || score === undefined) return;
		slots.push(index);
		scored.push({ item, score, index });
	});

	scored.sort((a, b) => b.score - a.score || a.index - b.index);

	const output: Array<T & { rerankScore?: number }> = items.map((item) => ({ ...item }));
	slots.forEach((slot, i) => {
		output[slot] = { ...scored[i].item, rerankScore: scored[i].score };
	});
	return output;
}

// ============================================================================
// Rerank Stage
// ============================================================================

export function createRerankStage(deps: RerankStageDeps): RerankStage {
	const { service, chunks, topM = DEFAULT_RERANK_TOP_M, retry, metrics } = deps;
	const log = (deps.logger ?? nullLogger).child({ component: "reranker", service: service.name });

	function withRanks(items: RankedResult[]): RankedResult[] {
		return items.map((item, index) => ({ ...item, rank: index + 1 }));
	}

	async function scoreHead(
		query: string,
		head: readonly FusedResult[],
		signal?: AbortSignal,
	): Promise<{ results: RankedResult[]; partial: boolean }> {
		const records = await chunks.getChunks(
			head.map((item) => item.chunkId),
			signal,
		);

		// Items without text are left unscored rather than sent empty
		const sendIndices: number[] = [];
		const documents: string[] = [];
		head.forEach((item, index) => {
			const text = records.get(item.chunkId)?.text;
			if (text === undefined) return;
			sendIndices.push(index);
			documents.push(text);
		});

		const scores: Array<number | null> = head.map(() => null);
		if (documents.length > 0) {
			const returned = await callBackend("reranker", (s) => service.score(query, documents, s), {
				retry,
				logger: log,
				metrics,
				signal,
			});
			if (returned.length !== documents.length) {
				throw new TransientBackendError(
					"reranker",
					`expected ${documents.length} scores, got ${returned.length}`,
				);
			}
			returned.forEach((score, i) => {
				scores[sendIndices[i]] = score !== null && Number.isFinite(score) ? score : null;
			});
		}

		const normalized = normalizeRerankScores(scores);
		return {
			results: applyRerankScores(head, normalized),
			partial: normalized.some((score) => score === null),
		};
	}

	return {
		async rerank(query, fused, _plan, signal) {
			if (fused.length === 0) return { value: [], degraded: false };

			const head = fused.slice(0, topM);
			const tail: RankedResult[] = fused.slice(topM).map((item) => ({ ...item }));

			const stop = metrics?.rerankDuration.start();
			try {
				const outcome = await degradeOnFailure(
					"Rerank",
					() => scoreHead(query, head, signal),
					{ results: head.map((item) => ({ ...item })), partial: false },
					log,
				);

				const partial = !outcome.degraded && outcome.value.partial;
				if (partial) {
					log.warn("Rerank scored only part of the candidates", { candidates: head.length });
				}

				return {
					value: withRanks([...outcome.value.results, ...tail]),
					degraded: outcome.degraded || partial,
					error: outcome.error,
				};
			} finally {
				stop?.();
			}
		},
	};
}

// ============================================================================
// Lexical Reranker
// ============================================================================

/**
 * Local BM25 scorer over the candidate batch itself (IDF from the batch).
 * Scores are mapped into [0, 1) with s / (1 + s). Used when no hosted
 * reranker is configured.
 */
export function createLexicalReranker(params: BM25Params = DEFAULT_BM25_PARAMS): RerankerService {
	const { k1, b } = params;

	return {
		name: "lexical-bm25",

		async score(query, documents) {
			const queryTerms = [...new Set(tokenize(query))];
			if (queryTerms.length === 0 || documents.length === 0) {
				return documents.map(() => 0);
			}

			const docs = documents.map((text) => {
				const terms = tokenize(text);
				const frequencies = new Map<string, number>();
				for (const term of terms) frequencies.set(term, (frequencies.get(term) ?? 0) + 1);
				return { length: terms.length, frequencies };
			});

			const avgLength = docs.reduce((sum, doc) => sum + doc.length, 0) / docs.length || 1;
			const idf = new Map(
				queryTerms.map((term) => [
					term,
					inverseDocumentFrequency(docs.length, docs.filter((doc) => doc.frequencies.has(term)).length),
				]),
			);

			return docs.map((doc) => {
				let score = 0;
				for (const term of queryTerms) {
					const tf = doc.frequencies.get(term) ?? 0;
					if (tf === 0) continue;
					const norm = tf + k1 * (1 - b + b * (doc.length / avgLength));
					score += (idf.get(term) ?? 0) * ((tf * (k1 + 1)) / norm);
				}
				return score / (1 + score);
			});
		},
	};
}
