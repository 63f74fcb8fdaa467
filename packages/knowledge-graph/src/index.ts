/**
 * Knowledge graph module exports
 */

export type {
	EntityNode,
	GraphStats,
	GraphStore,
	GraphWriter,
	NeighborEdge,
	NeighborQuery,
	RelationEdge,
} from "./types";

export { SqliteGraphStore } from "./graph-store";

export { createMemoryGraphStore, type MemoryGraphStore } from "./memory-graph-store";

export { compareEdges, walkNeighbors, DEFAULT_MAX_DEPTH, DEFAULT_MAX_FAN_OUT } from "./traversal";
