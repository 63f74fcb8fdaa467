/**
 * Query module exports
 */

export {
	createQueryPlanner,
	classifyQuery,
	computeCandidateLimit,
	isIdentifierLike,
	SearchRequestSchema,
	FilterValueSchema,
	SearchTypeSchema,
	type QueryPlanner,
	type QueryPlannerOptions,
} from "./query-planner";

export {
	createVectorSearcher,
	EMBEDDING_CACHE_NAMESPACE,
	type VectorSearcher,
	type VectorSearcherDeps,
} from "./vector-search";

export {
	createKeywordSearcher,
	bm25Score,
	inverseDocumentFrequency,
	compareHits,
	DEFAULT_BM25_PARAMS,
	type BM25Params,
	type KeywordSearcher,
	type KeywordSearcherDeps,
} from "./keyword-search";

export {
	fuseResults,
	normalizeScores,
	DEFAULT_FUSION_WEIGHTS,
	DEFAULT_RRF_KAPPA,
	type FusionOptions,
	type RankedList,
} from "./rrf-fusion";

export {
	createGraphExpander,
	DEFAULT_GRAPH_EXPANSION,
	type GraphExpander,
	type GraphExpanderDeps,
	type GraphExpansion,
	type GraphExpansionOptions,
} from "./graph-expander";

export {
	createRerankStage,
	createLexicalReranker,
	applyRerankScores,
	normalizeRerankScores,
	sigmoid,
	DEFAULT_RERANK_TOP_M,
	type RerankerService,
	type RerankStage,
	type RerankStageDeps,
} from "./reranker";

export {
	createVoyageReranker,
	isVoyageRerankerAvailable,
	type VoyageRerankerOptions,
} from "./voyage-reranker";

export {
	assembleResponse,
	buildSnippet,
	findHighlights,
	DEFAULT_SNIPPET_OPTIONS,
	type AssembleInput,
	type SnippetOptions,
} from "./response-assembler";

export {
	createSearchEngine,
	RESULT_CACHE_NAMESPACE,
	type SearchEngine,
	type SearchEngineDeps,
	type SearchOptions,
} from "./search-engine";

export {
	callBackend,
	degradeOnFailure,
	type BackendCallContext,
	type RetryPolicy,
	type StageResult,
} from "./backend-call";
