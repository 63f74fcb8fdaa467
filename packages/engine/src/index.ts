/**
 * @hybrid-retrieval/engine
 *
 * Query planning, vector + BM25 retrieval, reciprocal rank fusion, graph
 * expansion, reranking and response assembly, with a shared TTL cache.
 */

export * from "./types";

export {
	RetrievalError,
	ValidationError,
	TransientBackendError,
	FatalPipelineError,
	isAbortError,
	type BackendName,
	type RetrievalErrorCode,
} from "./errors";

export {
	EngineConfigSchema,
	LogLevelSchema,
	DEFAULT_ENGINE_CONFIG,
	loadConfig,
	parseConfig,
	type EngineConfig,
	type EngineConfigInput,
} from "./config";

export * from "./diagnostics";
export * from "./cache";
export * from "./storage";
export * from "./ingestion";
export * from "./embeddings";
export * from "./query";

export { tokenize, tokenizeWithOffsets, uniqueTerms, stem, isStopWord, type TokenSpan } from "./text/tokenizer";
export { TimeoutError, runWithTimeout, retryWithBackoff, sleep, type RetryOptions } from "./utils/async";

export { createLocalSearchEngine, type LocalEngine, type LocalEngineOptions } from "./local-engine";
