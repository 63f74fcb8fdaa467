/**
 * In-memory knowledge graph backed by graphology.
 *
 * Relations live in a directed multigraph keyed by entity id; chunk mentions are
 * kept in two id-to-id-set maps beside it.
 */

import Graph from "graphology";
import { walkNeighbors } from "./traversal";
import type {
	EntityNode,
	GraphStats,
	GraphStore,
	GraphWriter,
	NeighborEdge,
	NeighborQuery,
	RelationEdge,
} from "./types";

interface EntityAttributes {
	type: string;
	name: string;
	metadata?: Record<string, unknown>;
}

interface RelationAttributes {
	relation: string;
	weight: number;
}

export interface MemoryGraphStore extends GraphStore, GraphWriter {
	getStats(): GraphStats;
	clear(): void;
}

export function createMemoryGraphStore(): MemoryGraphStore {
	const graph = new Graph<EntityAttributes, RelationAttributes>({
		type: "directed",
		multi: true,
		allowSelfLoops: false,
	});

	const chunkToEntities = new Map<string, Set<string>>();
	const entityToChunks = new Map<string, Set<string>>();
	const documentChunks = new Map<string, Set<string>>();

	function addToIndex(index: Map<string, Set<string>>, key: string, value: string): void {
		let set = index.get(key);
		if (!set) {
			set = new Set();
			index.set(key, set);
		}
		set.add(value);
	}

	function ensureNode(id: string): void {
		if (!graph.hasNode(id)) {
			graph.addNode(id, { type: "unknown", name: id });
		}
	}

	function incidentEdges(entityId: string): RelationEdge[] {
		if (!graph.hasNode(entityId)) return [];

		const edges: RelationEdge[] = [];
		graph.forEachEdge(entityId, (_edge, attributes, source, target) => {
			edges.push({
				from: source,
				to: target,
				relation: attributes.relation,
				weight: attributes.weight,
			});
		});
		return edges;
	}

	return {
		addEntity(entity: EntityNode): void {
			graph.mergeNode(entity.id, {
				type: entity.type,
				name: entity.name,
				metadata: entity.metadata,
			});
		},

		addRelation(edge: Omit<RelationEdge, "weight"> & { weight?: number }): void {
			if (edge.from === edge.to) return;
			ensureNode(edge.from);
			ensureNode(edge.to);
			graph.mergeEdgeWithKey(`${edge.from}|${edge.relation}|${edge.to}`, edge.from, edge.to, {
				relation: edge.relation,
				weight: edge.weight ?? 1.0,
			});
		},

		linkChunk(chunkId: string, entityId: string, documentId?: string): void {
			addToIndex(chunkToEntities, chunkId, entityId);
			addToIndex(entityToChunks, entityId, chunkId);
			if (documentId !== undefined) {
				addToIndex(documentChunks, documentId, chunkId);
			}
		},

		unlinkDocument(documentId: string): number {
			const chunks = documentChunks.get(documentId);
			if (!chunks) return 0;

			let removed = 0;
			for (const chunkId of chunks) {
				const entities = chunkToEntities.get(chunkId);
				if (!entities) continue;
				for (const entityId of entities) {
					entityToChunks.get(entityId)?.delete(chunkId);
					removed++;
				}
				chunkToEntities.delete(chunkId);
			}
			documentChunks.delete(documentId);
			return removed;
		},

		async getEntitiesForChunk(chunkId: string, signal?: AbortSignal): Promise<string[]> {
			signal?.throwIfAborted();
			return [...(chunkToEntities.get(chunkId) ?? [])].sort();
		},

		async getChunksForEntity(entityId: string, limit = 50, signal?: AbortSignal): Promise<string[]> {
			signal?.throwIfAborted();
			return [...(entityToChunks.get(entityId) ?? [])].sort().slice(0, limit);
		},

		async getNeighbors(entityId: string, query?: NeighborQuery, signal?: AbortSignal): Promise<NeighborEdge[]> {
			signal?.throwIfAborted();
			return walkNeighbors(entityId, query, incidentEdges);
		},

		getStats(): GraphStats {
			let chunkLinkCount = 0;
			for (const entities of chunkToEntities.values()) {
				chunkLinkCount += entities.size;
			}
			return {
				entityCount: graph.order,
				relationCount: graph.size,
				chunkLinkCount,
			};
		},

		clear(): void {
			graph.clear();
			chunkToEntities.clear();
			entityToChunks.clear();
			documentChunks.clear();
		},
	};
}
