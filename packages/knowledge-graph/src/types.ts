/**
 * Knowledge graph types
 *
 * Entities and relations are addressed by stable string ids. Nothing holds a
 * direct reference to another node, so cycles in the data never become cycles
 * in memory.
 */

export interface EntityNode {
	id: string;
	/** Entity category, e.g. "person", "organization", "concept" */
	type: string;
	name: string;
	metadata?: Record<string, unknown>;
}

export interface RelationEdge {
	from: string;
	to: string;
	/** Relation label, e.g. "works_for" */
	relation: string;
	/** Relation strength, higher is stronger (default: 1.0) */
	weight: number;
}

/** Edge reached during a neighbor walk, oriented in walk direction */
export interface NeighborEdge extends RelationEdge {
	/** Hop count from the start entity (1 = direct neighbor) */
	depth: number;
}

export interface NeighborQuery {
	/** Maximum hops from the start entity (default: 1) */
	maxDepth?: number;
	/** Maximum new entities admitted per hop (default: 10) */
	maxFanOut?: number;
}

/**
 * Read contract consumed by the retrieval engine.
 *
 * Methods are async because production stores live behind a network hop. An
 * aborted signal rejects the call with the signal's reason.
 */
export interface GraphStore {
	/** Entities mentioned by a chunk */
	getEntitiesForChunk(chunkId: string, signal?: AbortSignal): Promise<string[]>;

	/** Chunks mentioning an entity, in id order */
	getChunksForEntity(entityId: string, limit?: number, signal?: AbortSignal): Promise<string[]>;

	/** Walk outward from an entity, cycle-safe, bounded by depth and fan-out */
	getNeighbors(entityId: string, query?: NeighborQuery, signal?: AbortSignal): Promise<NeighborEdge[]>;
}

/** Write side, owned by ingestion */
export interface GraphWriter {
	addEntity(entity: EntityNode): void;
	addRelation(edge: Omit<RelationEdge, "weight"> & { weight?: number }): void;
	/** Record that a chunk mentions an entity */
	linkChunk(chunkId: string, entityId: string, documentId?: string): void;
	/** Drop chunk links for a document (entities and relations are kept) */
	unlinkDocument(documentId: string): number;
}

export interface GraphStats {
	entityCount: number;
	relationCount: number;
	chunkLinkCount: number;
}
