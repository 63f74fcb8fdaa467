/**
 * Core types for @hybrid-retrieval/engine
 */

// ============================================================================
// Chunk (produced by ingestion, read-only here)
// ============================================================================

export type MetadataValue = string | number | boolean | null | Array<string | number>;

export interface TermStats {
	/** Token count after tokenization */
	length: number;
	/** Term → frequency within the chunk */
	frequencies: Record<string, number>;
}

export interface Chunk {
	id: string;
	documentId: string;
	text: string;
	embedding: number[];
	termStats: TermStats;
	metadata: Record<string, MetadataValue>;
	/** Ordinal position of the chunk within its document */
	position: number;
	page?: number;
}

// ============================================================================
// Filters
// ============================================================================

export interface RangeFilter {
	gte?: number;
	lte?: number;
}

export type FilterValue = string | number | boolean | Array<string | number> | RangeFilter;

export type SearchFilters = Record<string, FilterValue>;

// ============================================================================
// Retrieval
// ============================================================================

export type HitSource = "vector" | "keyword" | "graph";

/** Source priority for deterministic tie-breaking (lower wins) */
export const SOURCE_PRIORITY: Record<HitSource, number> = {
	vector: 0,
	keyword: 1,
	graph: 2,
};

export interface SearchHit {
	chunkId: string;
	/** Source-native score, higher is better */
	rawScore: number;
	source: HitSource;
}

export interface FusedResult {
	chunkId: string;
	/** Fused score scaled into [0, 1] */
	fusedScore: number;
	/** Unscaled weighted reciprocal-rank sum */
	rrfScore: number;
	sources: Set<HitSource>;
	/** 1-based position in the fused list */
	rank: number;
	/** 1-based rank within each contributing list */
	sourceRanks: Partial<Record<HitSource, number>>;
	/** Min-max normalized raw score within each contributing list */
	normalizedScores: Partial<Record<HitSource, number>>;
}

/** Fused result after the optional rerank stage */
export interface RankedResult extends FusedResult {
	/** Relevance from the reranker, when it scored this item */
	rerankScore?: number;
}

// ============================================================================
// Planning
// ============================================================================

export type SearchType = "vector" | "keyword" | "hybrid";

export interface SearchRequest {
	query: string;
	topK?: number;
	filters?: SearchFilters;
	searchType?: SearchType;
	includeMetadata?: boolean;
	rerank?: boolean;
}

export interface SearchPlan {
	readonly query: string;
	readonly searchType: SearchType;
	readonly topK: number;
	/** Candidates requested from each searcher */
	readonly candidateLimit: number;
	readonly filters: Readonly<SearchFilters>;
	readonly rerankEnabled: boolean;
	readonly graphExpandEnabled: boolean;
	readonly includeMetadata: boolean;
}

// ============================================================================
// Response
// ============================================================================

export type DegradedFlag = "vector" | "keyword" | "graph" | "rerank";

export interface HighlightSpan {
	/** Offset into the result content (inclusive) */
	start: number;
	/** Offset into the result content (exclusive) */
	end: number;
	/** Query term that matched */
	term: string;
}

export interface SearchResultItem {
	chunkId: string;
	documentId: string;
	content: string;
	score: number;
	rank: number;
	sources: HitSource[];
	metadata: Record<string, MetadataValue> | null;
	highlights: HighlightSpan[];
}

export interface SearchResponse {
	query: string;
	results: SearchResultItem[];
	totalResults: number;
	/** Distinct candidates seen before truncation to topK */
	totalCandidates: number;
	searchTimeMs: number;
	searchType: SearchType;
	degradedFlags: DegradedFlag[];
	/** true when served from the query-result cache */
	cached: boolean;
}

// ============================================================================
// Ingestion events
// ============================================================================

export interface DocumentEvent {
	type: "updated" | "deleted";
	documentId: string;
}

// ============================================================================
// Backend contracts
// ============================================================================

/** Chunk as read back for ranking and response assembly */
export type ChunkRecord = Omit<Chunk, "embedding" | "termStats">;

export interface ChunkReader {
	/** Chunks by id; unknown ids are absent from the map */
	getChunks(ids: readonly string[], signal?: AbortSignal): Promise<Map<string, ChunkRecord>>;
}

export interface VectorMatch {
	chunkId: string;
	/** Cosine similarity in [-1, 1] */
	similarity: number;
}

export interface VectorIndex {
	query(
		embedding: readonly number[],
		topK: number,
		filters?: Readonly<SearchFilters>,
		signal?: AbortSignal,
	): Promise<VectorMatch[]>;
}

export interface TermMatch {
	chunkId: string;
	/** Token count of the chunk */
	length: number;
	/** Frequency of each matched query term */
	frequencies: Record<string, number>;
}

export interface CorpusStats {
	/** Chunks in the index */
	totalChunks: number;
	averageLength: number;
	/** Chunks containing each query term */
	documentFrequencies: Record<string, number>;
}

export interface KeywordQueryResult {
	matches: TermMatch[];
	corpus: CorpusStats;
}

export interface KeywordIndex {
	query(
		terms: readonly string[],
		options?: { filters?: Readonly<SearchFilters>; limit?: number; signal?: AbortSignal },
	): Promise<KeywordQueryResult>;
}
