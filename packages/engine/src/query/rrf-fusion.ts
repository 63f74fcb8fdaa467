/**
 * Result Fusion - weighted Reciprocal Rank Fusion
 *
 * rrfScore(d) = Σ weight(source) / (rank_source(d) + κ), 1-based ranks.
 * fusedScore scales rrfScore by the best score any chunk could reach across
 * the non-empty input lists, so it lies in [0, 1] without changing order.
 *
 * Ordering: fusedScore desc, then source priority (vector > keyword > graph),
 * then summed min-max normalized raw score desc, then first appearance.
 */

import { type FusedResult, type HitSource, SOURCE_PRIORITY, type SearchHit } from "../types";

// ============================================================================
// Types
// ============================================================================

export interface RankedList {
	source: HitSource;
	/** Hits in rank order (best first) */
	hits: readonly SearchHit[];
}

export interface FusionOptions {
	/** RRF smoothing constant (default: 60) */
	kappa?: number;
	/** Per-source weights (default: vector 1.0, keyword 1.0, graph 0.5) */
	weights?: Partial<Record<HitSource, number>>;
}

export const DEFAULT_RRF_KAPPA = 60;

export const DEFAULT_FUSION_WEIGHTS: Record<HitSource, number> = {
	vector: 1.0,
	keyword: 1.0,
	graph: 0.5,
};

const SCORE_EPSILON = 1e-12;

// ============================================================================
// Normalization
// ============================================================================

/**
 * Min-max normalize raw scores into [0, 1]. A single hit, or a list whose
 * scores are all equal, normalizes to 1.0.
 */
export function normalizeScores(hits: readonly SearchHit[]): number[] {
	if (hits.length === 0) return [];

	let min = Infinity;
	let max = -Infinity;
	for (const hit of hits) {
		if (hit.rawScore < min) min = hit.rawScore;
		if (hit.rawScore > max) max = hit.rawScore;
	}

	const range = max - min;
	if (range <= 0) return hits.map(() => 1.0);
	return hits.map((hit) => (hit.rawScore - min) / range);
}

// ============================================================================
// Fusion
// ============================================================================

interface Accumulator {
	chunkId: string;
	rrfScore: number;
	sources: Set<HitSource>;
	sourceRanks: Partial<Record<HitSource, number>>;
	normalizedScores: Partial<Record<HitSource, number>>;
	normalizedSum: number;
	priority: number;
	firstSeen: number;
}

export function fuseResults(lists: readonly RankedList[], options: FusionOptions = {}): FusedResult[] {
	const kappa = options.kappa ?? DEFAULT_RRF_KAPPA;
	const weights = { ...DEFAULT_FUSION_WEIGHTS, ...options.weights };

	const byChunk = new Map<string, Accumulator>();
	let maxPossible = 0;
	let order = 0;

	for (const list of lists) {
		if (list.hits.length === 0) continue;

		const weight = weights[list.source];
		maxPossible += weight / (1 + kappa);

		const normalized = normalizeScores(list.hits);
		const seenInList = new Set<string>();

		list.hits.forEach((hit, index) => {
			// Duplicates within one list keep their best (first) rank
			if (seenInList.has(hit.chunkId)) return;
			seenInList.add(hit.chunkId);

			const rank = index + 1;
			let acc = byChunk.get(hit.chunkId);
			if (!acc) {
				acc = {
					chunkId: hit.chunkId,
					rrfScore: 0,
					sources: new Set(),
					sourceRanks: {},
					normalizedScores: {},
					normalizedSum: 0,
					priority: SOURCE_PRIORITY[list.source],
					firstSeen: order++,
				};
				byChunk.set(hit.chunkId, acc);
			}

			acc.rrfScore += weight / (rank + kappa);
			acc.sources.add(list.source);
			acc.sourceRanks[list.source] = rank;
			acc.normalizedScores[list.source] = normalized[index];
			acc.normalizedSum += normalized[index];
			acc.priority = Math.min(acc.priority, SOURCE_PRIORITY[list.source]);
		});
	}

	const sorted = [...byChunk.values()].sort((a, b) => {
		if (Math.abs(b.rrfScore - a.rrfScore) > SCORE_EPSILON) return b.rrfScore - a.rrfScore;
		if (a.priority !== b.priority) return a.priority - b.priority;
		if (Math.abs(b.normalizedSum - a.normalizedSum) > SCORE_EPSILON) return b.normalizedSum - a.normalizedSum;
		return a.firstSeen - b.firstSeen;
	});

	return sorted.map((acc, index) => ({
		chunkId: acc.chunkId,
		fusedScore: maxPossible > 0 ? Math.min(1, acc.rrfScore / maxPossible) : 0,
		rrfScore: acc.rrfScore,
		sources: acc.sources,
		rank: index + 1,
		sourceRanks: acc.sourceRanks,
		normalizedScores: acc.normalizedScores,
	}));
}
