/**
 * Response Assembler
 *
 * Joins ranked results with chunk content, builds snippets with highlight
 * spans and fills in the response envelope.
 */

import { tokenizeWithOffsets, uniqueTerms } from "../text/tokenizer";
import {
	type ChunkRecord,
	type DegradedFlag,
	type HighlightSpan,
	type HitSource,
	type RankedResult,
	type SearchPlan,
	type SearchResponse,
	type SearchResultItem,
	SOURCE_PRIORITY,
} from "../types";

// ============================================================================
// Types
// ============================================================================

export interface SnippetOptions {
	/** Maximum snippet length in characters (default: 500) */
	snippetLength: number;
	/** Characters kept before the first match when the text is trimmed (default: 80) */
	snippetLeadChars: number;
}

export const DEFAULT_SNIPPET_OPTIONS: SnippetOptions = {
	snippetLength: 500,
	snippetLeadChars: 80,
};

export interface AssembleInput {
	plan: SearchPlan;
	/** Final ordering; truncated to plan.topK here */
	results: readonly RankedResult[];
	chunks: ReadonlyMap<string, ChunkRecord>;
	degradedFlags: Iterable<DegradedFlag>;
	/** Distinct candidates before truncation */
	totalCandidates: number;
	/** performance.now() at request start */
	startedAt: number;
	/** performance.now() at assembly (default: now) */
	finishedAt?: number;
	snippet?: Partial<SnippetOptions>;
}

const DEGRADED_ORDER: DegradedFlag[] = ["vector", "keyword", "graph", "rerank"];

// ============================================================================
// Snippets and highlights
// ============================================================================

/**
 * Spans of `text` whose normalized term is one of `queryTerms`.
 */
export function findHighlights(text: string, queryTerms: ReadonlySet<string>): HighlightSpan[] {
	if (queryTerms.size === 0) return [];
	return tokenizeWithOffsets(text)
		.filter((span) => queryTerms.has(span.term))
		.map((span) => ({ start: span.start, end: span.end, term: span.term }));
}

/**
 * The whole text when it fits, otherwise a window that starts a little before
 * the first query-term match (or at the beginning when nothing matches).
 */
export function buildSnippet(
	text: string,
	queryTerms: ReadonlySet<string>,
	options: SnippetOptions = DEFAULT_SNIPPET_OPTIONS,
): string {
	const { snippetLength, snippetLeadChars } = options;
	if (text.length <= snippetLength) return text;

	const first = findHighlights(text, queryTerms)[0];
	if (!first) return text.slice(0, snippetLength);

	let start = Math.max(0, first.start - snippetLeadChars);
	if (start + snippetLength > text.length) start = text.length - snippetLength;
	return text.slice(start, start + snippetLength);
}

function orderedSources(sources: Set<HitSource>): HitSource[] {
	return [...sources].sort((a, b) => SOURCE_PRIORITY[a] - SOURCE_PRIORITY[b]);
}

/** For each position, the first rerank score after it (-Infinity when none) */
function rerankFloors(results: readonly RankedResult[]): number[] {
	const floors = new Array<number>(results.length);
	let floor = Number.NEGATIVE_INFINITY;
	for (let i = results.length - 1; i >= 0; i--) {
		floors[i] = floor;
		floor = results[i].rerankScore ?? floor;
	}
	return floors;
}

// ============================================================================
// Assembly
// ============================================================================

/**
 * Items the reranker did not score (past top-M, or dropped from a partial
 * rerank) keep their fused score clamped between the scores around them, so
 * `score` never rises further down the list.
 */
export function assembleResponse(input: AssembleInput): SearchResponse {
	const { plan, chunks, totalCandidates, startedAt } = input;
	const snippetOptions = { ...DEFAULT_SNIPPET_OPTIONS, ...input.snippet };
	const queryTerms = new Set(uniqueTerms(plan.query));
	const floors = rerankFloors(input.results);

	const results: SearchResultItem[] = [];
	let ceiling = Number.POSITIVE_INFINITY;
	for (const [index, result] of input.results.entries()) {
		if (results.length >= plan.topK) break;

		// A chunk deleted after retrieval is dropped rather than returned empty
		const chunk = chunks.get(result.chunkId);
		if (!chunk) continue;

		const score = result.rerankScore ?? Math.min(ceiling, Math.max(floors[index], result.fusedScore));
		ceiling = score;

		const content = buildSnippet(chunk.text, queryTerms, snippetOptions);
		results.push({
			chunkId: chunk.id,
			documentId: chunk.documentId,
			content,
			score,
			rank: results.length + 1,
			sources: orderedSources(result.sources),
			metadata: plan.includeMetadata ? { ...chunk.metadata } : null,
			highlights: findHighlights(content, queryTerms),
		});
	}

	const flags = new Set(input.degradedFlags);
	const finishedAt = input.finishedAt ?? performance.now();

	return {
		query: plan.query,
		results,
		totalResults: results.length,
		totalCandidates,
		searchTimeMs: Math.max(0, Math.round((finishedAt - startedAt) * 100) / 100),
		searchType: plan.searchType,
		degradedFlags: DEGRADED_ORDER.filter((flag) => flags.has(flag)),
		cached: false,
	};
}
