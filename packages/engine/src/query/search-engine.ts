/**
 * Search Engine - orchestrates one query end to end
 *
 * plan → result cache → {vector, keyword} under a shared deadline, joined at a
 * barrier → fusion → graph expansion (own budget) → rerank (own budget) →
 * assemble.
 *
 * Only the cache manager is shared between concurrent queries. Identical
 * concurrent queries share one pipeline run through the result cache, and every
 * caller gets its own copy of the response. Every other piece of state lives
 * for one call.
 */

import type { GraphStore } from "@hybrid-retrieval/knowledge-graph";
import { deriveCacheKey } from "../cache/cache-key";
import { createCacheManager, type CacheManager, type CacheRegion } from "../cache/cache-manager";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config";
import { nullLogger, type Logger } from "../diagnostics/logger";
import type { RetrievalMetrics } from "../diagnostics/metrics";
import type { Embedder } from "../embeddings/embedder";
import { type BackendName, FatalPipelineError, TransientBackendError, ValidationError } from "../errors";
import type {
	ChunkReader,
	ChunkRecord,
	DegradedFlag,
	DocumentEvent,
	FusedResult,
	KeywordIndex,
	RankedResult,
	SearchHit,
	SearchPlan,
	SearchRequest,
	SearchResponse,
	SearchType,
	VectorIndex,
} from "../types";
import { runWithTimeout } from "../utils/async";
import type { RetryPolicy, StageResult } from "./backend-call";
import { createGraphExpander, type GraphExpander } from "./graph-expander";
import { createKeywordSearcher } from "./keyword-search";
import { createQueryPlanner } from "./query-planner";
import { createLexicalReranker, createRerankStage, type RerankerService } from "./reranker";
import { assembleResponse } from "./response-assembler";
import { fuseResults, type RankedList } from "./rrf-fusion";
import { createVectorSearcher, EMBEDDING_CACHE_NAMESPACE } from "./vector-search";

// ============================================================================
// Types
// ============================================================================

export interface SearchEngineDeps {
	vectorIndex: VectorIndex;
	keywordIndex: KeywordIndex;
	chunks: ChunkReader;
	embedder: Embedder;
	/** Enables graph expansion when config.graph.enabled is also set */
	graph?: GraphStore;
	/** Pairwise reranker (default: local lexical BM25) */
	reranker?: RerankerService;
	/** Shared cache; created from config.cache when omitted and enabled */
	cache?: CacheManager;
	/** Current index snapshot revision, part of every result cache key */
	indexRevision?: () => number;
	config?: EngineConfig;
	logger?: Logger;
	metrics?: RetrievalMetrics;
}

export interface SearchOptions {
	/** Aborts every in-flight stage; the search rejects with the abort reason */
	signal?: AbortSignal;
}

export interface SearchEngine {
	/**
	 * @throws ValidationError for a malformed request
	 * @throws FatalPipelineError when every planned retrieval path failed
	 */
	search(request: SearchRequest, options?: SearchOptions): Promise<SearchResponse>;

	/** Drop cached entries derived from a changed or deleted document */
	handleDocumentEvent(event: DocumentEvent): number;

	/** Start background cache maintenance */
	start(): void;

	/** Stop background work and flush the cache */
	stop(): void;

	readonly cache: CacheManager | null;
}

type PrimaryBranch = "vector" | "keyword";

/** Retrieval branches run for each search type */
const PRIMARY_BRANCHES: Record<SearchType, readonly PrimaryBranch[]> = {
	vector: ["vector"],
	keyword: ["keyword"],
	hybrid: ["vector", "keyword"],
};

const BRANCH_BACKEND: Record<PrimaryBranch, BackendName> = {
	vector: "vector-index",
	keyword: "keyword-index",
};

export const RESULT_CACHE_NAMESPACE = "results";

// ============================================================================
// Helpers
// ============================================================================

function throwIfAborted(signal?: AbortSignal): void {
	if (signal?.aborted) {
		throw signal.reason ?? new DOMException("The operation was aborted", "AbortError");
	}
}

function elapsedMs(startedAt: number): number {
	return Math.round((performance.now() - startedAt) * 100) / 100;
}

function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/** Chunk reader that remembers what one request already loaded */
function memoizeChunks(reader: ChunkReader): ChunkReader {
	const loaded = new Map<string, ChunkRecord>();
	const missing = new Set<string>();

	return {
		async getChunks(ids, signal) {
			const toFetch = ids.filter((id) => !loaded.has(id) && !missing.has(id));
			if (toFetch.length > 0) {
				const fetched = await reader.getChunks(toFetch, signal);
				for (const id of toFetch) {
					const chunk = fetched.get(id);
					if (chunk) loaded.set(id, chunk);
					else missing.add(id);
				}
			}
			const result = new Map<string, ChunkRecord>();
			for (const id of ids) {
				const chunk = loaded.get(id);
				if (chunk) result.set(id, chunk);
			}
			return result;
		},
	};
}

// ============================================================================
// Implementation
// ============================================================================

export function createSearchEngine(deps: SearchEngineDeps): SearchEngine {
	const config = deps.config ?? DEFAULT_ENGINE_CONFIG;
	const { metrics } = deps;
	const logger = deps.logger ?? nullLogger;
	const log = logger.child({ component: "search-engine" });
	const retry: RetryPolicy = config.retry;

	const cache =
		deps.cache ??
		(config.cache.enabled
			? createCacheManager({
					defaultTtlMs: config.cache.resultTtlMs,
					maxEntries: config.cache.maxEntries,
					sweepIntervalMs: config.cache.sweepIntervalMs,
					logger,
					metrics,
				})
			: null);

	const embeddingCache: CacheRegion<number[]> | undefined =
		cache?.region<number[]>(EMBEDDING_CACHE_NAMESPACE, { ttlMs: config.cache.embeddingTtlMs });
	const resultCache: CacheRegion<SearchResponse> | undefined =
		cache?.region<SearchResponse>(RESULT_CACHE_NAMESPACE, { ttlMs: config.cache.resultTtlMs });

	const planner = createQueryPlanner({ config, graphAvailable: deps.graph !== undefined });
	const vectorSearcher = createVectorSearcher({
		index: deps.vectorIndex,
		embedder: deps.embedder,
		embeddingCache,
		retry,
		logger,
		metrics,
	});
	const keywordSearcher = createKeywordSearcher({
		index: deps.keywordIndex,
		retry,
		bm25: config.bm25,
		logger,
		metrics,
	});
	const graphExpander: GraphExpander | null = deps.graph
		? createGraphExpander({ store: deps.graph, options: config.graph, retry, logger, metrics })
		: null;
	const rerankService = deps.reranker ?? createLexicalReranker(config.bm25);

	const runBranch: Record<
		PrimaryBranch,
		(plan: SearchPlan, signal: AbortSignal) => Promise<StageResult<SearchHit[]>>
	> = {
		vector: (plan, signal) => vectorSearcher.search(plan.query, plan, signal),
		keyword: (plan, signal) => keywordSearcher.search(plan.query, plan, signal),
	};

	function resultCacheKey(plan: SearchPlan): string {
		const version = deps.indexRevision
			? `${config.versions.index}.${deps.indexRevision()}`
			: config.versions.index;
		return deriveCacheKey(RESULT_CACHE_NAMESPACE, version, plan);
	}

	/**
	 * Run the planned primary branches concurrently. Each gets the same budget
	 * from the same start, and a branch timing out does not cancel the others.
	 */
	async function retrievePrimary(
		plan: SearchPlan,
		degraded: Set<DegradedFlag>,
		signal?: AbortSignal,
	): Promise<RankedList[]> {
		const branches = PRIMARY_BRANCHES[plan.searchType];
		const settled = await Promise.allSettled(
			branches.map((branch) =>
				runWithTimeout((s) => runBranch[branch](plan, s), {
					timeoutMs: config.timeouts.queryMs,
					label: `${branch} search`,
					signal,
				}),
			),
		);

		throwIfAborted(signal);

		const lists: RankedList[] = [];
		const failures: TransientBackendError[] = [];

		settled.forEach((outcome, i) => {
			const branch = branches[i];
			if (outcome.status === "fulfilled") {
				lists.push({ source: branch, hits: outcome.value.value });
				if (outcome.value.degraded) {
					degraded.add(branch);
					if (outcome.value.error) failures.push(outcome.value.error);
				}
				return;
			}

			degraded.add(branch);
			failures.push(TransientBackendError.from(BRANCH_BACKEND[branch], outcome.reason));
			log.warn(`${branch} search failed`, { error: errorMessage(outcome.reason) });
		});

		if (branches.every((branch) => degraded.has(branch))) {
			throw new FatalPipelineError(
				`All retrieval paths failed for ${plan.searchType} search: ${failures.map((f) => f.message).join("; ")}`,
				failures,
			);
		}

		return lists;
	}

	async function expandGraph(
		plan: SearchPlan,
		lists: RankedList[],
		fused: FusedResult[],
		degraded: Set<DegradedFlag>,
		signal?: AbortSignal,
	): Promise<FusedResult[]> {
		if (!graphExpander || !plan.graphExpandEnabled || fused.length === 0) return fused;

		try {
			const result = await runWithTimeout((s) => graphExpander.expand(fused, plan, s), {
				timeoutMs: config.timeouts.graphMs,
				label: "graph expansion",
				signal,
			});
			if (result.degraded) degraded.add("graph");
			if (result.value.hits.length === 0) return fused;
			return fuseResults([...lists, { source: "graph", hits: result.value.hits }], config.fusion);
		} catch (error) {
			throwIfAborted(signal);
			degraded.add("graph");
			log.warn("Graph expansion skipped", { error: errorMessage(error) });
			return fused;
		}
	}

	async function rerank(
		plan: SearchPlan,
		fused: FusedResult[],
		chunks: ChunkReader,
		degraded: Set<DegradedFlag>,
		signal?: AbortSignal,
	): Promise<RankedResult[]> {
		if (!plan.rerankEnabled || fused.length === 0) return fused;

		const stage = createRerankStage({
			service: rerankService,
			chunks,
			topM: config.rerank.topM,
			retry,
			logger,
			metrics,
		});

		try {
			const result = await runWithTimeout((s) => stage.rerank(plan.query, fused, plan, s), {
				timeoutMs: config.timeouts.rerankMs,
				label: "rerank",
				signal,
			});
			if (result.degraded) degraded.add("rerank");
			return result.value;
		} catch (error) {
			throwIfAborted(signal);
			degraded.add("rerank");
			log.warn("Rerank skipped", { error: errorMessage(error) });
			return fused;
		}
	}

	/** Load chunks for the head of the ranking until topK are present or candidates run out */
	async function loadForResponse(
		plan: SearchPlan,
		ranked: readonly RankedResult[],
		chunks: ChunkReader,
		signal?: AbortSignal,
	): Promise<Map<string, ChunkRecord>> {
		const loaded = new Map<string, ChunkRecord>();
		for (let offset = 0; offset < ranked.length && loaded.size < plan.topK; offset += plan.topK) {
			throwIfAborted(signal);
			const batch = ranked.slice(offset, offset + plan.topK).map((result) => result.chunkId);
			for (const [id, chunk] of await chunks.getChunks(batch, signal)) loaded.set(id, chunk);
		}
		throwIfAborted(signal);
		return loaded;
	}

	async function execute(plan: SearchPlan, startedAt: number, signal?: AbortSignal): Promise<SearchResponse> {
		const degraded = new Set<DegradedFlag>();
		const chunks = memoizeChunks(deps.chunks);

		const lists = await retrievePrimary(plan, degraded, signal);
		const fused = await expandGraph(plan, lists, fuseResults(lists, config.fusion), degraded, signal);
		throwIfAborted(signal);

		const ranked = await rerank(plan, fused, chunks, degraded, signal);
		const records = await loadForResponse(plan, ranked, chunks, signal);

		return assembleResponse({
			plan,
			results: ranked,
			chunks: records,
			degradedFlags: degraded,
			totalCandidates: fused.length,
			startedAt,
			snippet: config.response,
		});
	}

	const engine: SearchEngine = {
		cache,

		async search(request, options = {}) {
			const { signal } = options;
			const startedAt = performance.now();
			const stopTimer = metrics?.searchDuration.start();
			metrics?.searchesExecuted.inc();

			try {
				throwIfAborted(signal);
				const plan = planner.plan(request);

				let response: SearchResponse;
				if (resultCache) {
					// Degraded responses are shared with concurrent callers but never stored
					const { value, status } = await resultCache.lookup(
						resultCacheKey(plan),
						(shared) => execute(plan, startedAt, shared),
						{
							signal,
							documentIds: (result) => [...new Set(result.results.map((item) => item.documentId))],
							shouldCommit: (result) => result.degradedFlags.length === 0,
						},
					);
					if (status !== "miss") log.debug(`Result cache ${status}`, { searchType: plan.searchType });
					response = {
						...structuredClone(value),
						searchTimeMs: status === "miss" ? value.searchTimeMs : elapsedMs(startedAt),
						cached: status === "hit",
					};
				} else {
					response = await execute(plan, startedAt, signal);
				}

				if (response.degradedFlags.length > 0) {
					metrics?.degradedResponses.inc();
					log.warn("Search completed in degraded mode", {
						searchType: plan.searchType,
						degraded: response.degradedFlags,
					});
				}

				log.debug("Search completed", {
					searchType: plan.searchType,
					results: response.totalResults,
					candidates: response.totalCandidates,
					ms: response.searchTimeMs,
				});
				return response;
			} catch (error) {
				if (error instanceof ValidationError) {
					metrics?.validationErrors.inc();
				} else if (error instanceof FatalPipelineError) {
					metrics?.fatalErrors.inc();
					log.error("Search failed", error, { failures: error.failures.map((f) => f.backend) });
				}
				throw error;
			} finally {
				stopTimer?.();
			}
		},

		handleDocumentEvent(event) {
			return cache?.handleDocumentEvent(event) ?? 0;
		},

		start() {
			cache?.start();
		},

		stop() {
			cache?.stop();
			cache?.flush();
		},
	};

	return engine;
}
