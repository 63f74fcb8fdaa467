/**
 * Graph Expander - k-hop expansion through the knowledge graph
 *
 * Seeds are the top fused chunks. Their entities are walked outward hop by hop
 * with one visited set for the whole expansion, so cycles and entities shared
 * between seeds are visited once. Each hop admits at most maxFanOut new
 * entities across the whole frontier. Chunks mentioning a reached entity become
 * graph hits scored baseWeight / 2^depth, at most maxDepth × maxFanOut of them.
 */

import { compareEdges, type GraphStore, type NeighborEdge } from "@hybrid-retrieval/knowledge-graph";
import { nullLogger, type Logger } from "../diagnostics/logger";
import type { RetrievalMetrics } from "../diagnostics/metrics";
import type { FusedResult, SearchHit, SearchPlan } from "../types";
import { callBackend, degradeOnFailure, type RetryPolicy, type StageResult } from "./backend-call";
import { compareHits } from "./keyword-search";

// ============================================================================
// Types
// ============================================================================

export interface GraphExpansionOptions {
	/** Top fused chunks used as seeds (default: 10) */
	seedCount: number;
	/** Hops from the seed entities (default: 2) */
	maxDepth: number;
	/** New entities admitted per hop (default: 10) */
	maxFanOut: number;
	/** Score of a chunk linked at depth 0 (default: 1.0) */
	baseWeight: number;
	/** Chunks emitted per reached entity (default: 5) */
	maxChunksPerEntity: number;
}

export const DEFAULT_GRAPH_EXPANSION: GraphExpansionOptions = {
	seedCount: 10,
	maxDepth: 2,
	maxFanOut: 10,
	baseWeight: 1.0,
	maxChunksPerEntity: 5,
};

export interface GraphExpanderDeps {
	store: GraphStore;
	options?: Partial<GraphExpansionOptions>;
	retry: RetryPolicy;
	logger?: Logger;
	metrics?: RetrievalMetrics;
}

export interface GraphExpansion {
	hits: SearchHit[];
	/** Entities reached, seeds included */
	entitiesVisited: number;
}

export interface GraphExpander {
	/** Backend failures degrade to no hits; aborts reject */
	expand(fused: readonly FusedResult[], plan: SearchPlan, signal?: AbortSignal): Promise<StageResult<GraphExpansion>>;
}

// ============================================================================
// Implementation
// ============================================================================

function throwIfAborted(signal?: AbortSignal): void {
	if (signal?.aborted) {
		throw signal.reason ?? new DOMException("The operation was aborted", "AbortError");
	}
}

export function createGraphExpander(deps: GraphExpanderDeps): GraphExpander {
	const { store, retry, metrics } = deps;
	const options = { ...DEFAULT_GRAPH_EXPANSION, ...deps.options };
	const log = (deps.logger ?? nullLogger).child({ component: "graph-expander" });

	/**
	 * One hop from the whole frontier: edges to entities not reached yet,
	 * strongest first, admitting at most maxFanOut entities.
	 */
	async function nextHop(
		frontier: string[],
		reached: ReadonlyMap<string, number>,
		signal?: AbortSignal,
	): Promise<string[]> {
		// Already reached neighbours can fill a per-entity listing, so ask for enough to cover them
		const perEntity = options.maxFanOut + reached.size;
		const candidates: NeighborEdge[] = [];
		for (const entityId of frontier) {
			throwIfAborted(signal);
			const edges = await store.getNeighbors(entityId, { maxDepth: 1, maxFanOut: perEntity }, signal);
			for (const edge of edges) {
				if (!reached.has(edge.to)) candidates.push(edge);
			}
		}

		const admitted = new Set<string>();
		for (const edge of candidates.sort(compareEdges)) {
			if (admitted.size >= options.maxFanOut) break;
			admitted.add(edge.to);
		}
		return [...admitted];
	}

	async function walk(seedChunks: string[], signal?: AbortSignal): Promise<GraphExpansion> {
		const seedSet = new Set(seedChunks);

		// entity id → depth at which it was first reached
		const reached = new Map<string, number>();
		let frontier: string[] = [];

		for (const chunkId of seedChunks) {
			for (const entityId of await store.getEntitiesForChunk(chunkId, signal)) {
				if (reached.has(entityId)) continue;
				reached.set(entityId, 0);
				frontier.push(entityId);
			}
		}

		for (let depth = 1; depth <= options.maxDepth && frontier.length > 0; depth++) {
			frontier = await nextHop(frontier, reached, signal);
			for (const entityId of frontier) reached.set(entityId, depth);
		}

		const best = new Map<string, number>();
		for (const [entityId, depth] of reached) {
			throwIfAborted(signal);
			const score = options.baseWeight / 2 ** depth;
			const linked = await store.getChunksForEntity(entityId, options.maxChunksPerEntity + seedSet.size, signal);

			let emitted = 0;
			for (const chunkId of linked) {
				if (emitted >= options.maxChunksPerEntity) break;
				if (seedSet.has(chunkId)) continue;
				emitted++;
				if (score > (best.get(chunkId) ?? -Infinity)) best.set(chunkId, score);
			}
		}

		const hits = [...best].map(([chunkId, rawScore]): SearchHit => ({ chunkId, rawScore, source: "graph" }));
		return {
			hits: hits.sort(compareHits).slice(0, options.maxDepth * options.maxFanOut),
			entitiesVisited: reached.size,
		};
	}

	return {
		async expand(fused, _plan, signal) {
			const seeds = fused.slice(0, options.seedCount).map((result) => result.chunkId);
			if (seeds.length === 0) {
				return { value: { hits: [], entitiesVisited: 0 }, degraded: false };
			}

			const stop = metrics?.graphDuration.start();
			try {
				const result = await degradeOnFailure(
					"Graph expansion",
					() => callBackend("graph-store", (s) => walk(seeds, s), { retry, logger: log, metrics, signal }),
					{ hits: [], entitiesVisited: 0 },
					log,
				);
				log.debug("Graph expansion finished", {
					seeds: seeds.length,
					entitiesVisited: result.value.entitiesVisited,
					hits: result.value.hits.length,
				});
				return result;
			} finally {
				stop?.();
			}
		},
	};
}
