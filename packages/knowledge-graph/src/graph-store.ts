/**
 * Knowledge Graph Store
 *
 * SQLite-based storage for entities, relations and chunk back-references.
 */

import Database from "better-sqlite3";
import { mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";
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

interface EntityRow {
	id: string;
	type: string;
	name: string;
	metadata: string | null;
}

interface RelationRow {
	from_id: string;
	to_id: string;
	relation: string;
	weight: number;
}

function parseMetadata(raw: string): Record<string, unknown> | undefined {
	const parsed: unknown = JSON.parse(raw);
	if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return undefined;
	return Object.fromEntries(Object.entries(parsed));
}

/**
 * Graph store using SQLite for persistence
 */
export class SqliteGraphStore implements GraphStore, GraphWriter {
	private db: Database.Database;

	constructor(dbPath: string = ":memory:") {
		if (dbPath !== ":memory:") {
			// Ensure parent directory exists before opening database
			const dir = dirname(dbPath);
			if (!existsSync(dir)) {
				mkdirSync(dir, { recursive: true });
			}
		}
		this.db = new Database(dbPath);
		this.initTables();
	}

	private initTables(): void {
		this.db.exec(`
			CREATE TABLE IF NOT EXISTS entities (
				id TEXT PRIMARY KEY,
				type TEXT NOT NULL,
				name TEXT NOT NULL,
				metadata TEXT
			);

			CREATE TABLE IF NOT EXISTS relations (
				id INTEGER PRIMARY KEY AUTOINCREMENT,
				from_id TEXT NOT NULL,
				to_id TEXT NOT NULL,
				relation TEXT NOT NULL,
				weight REAL DEFAULT 1.0,
				UNIQUE(from_id, to_id, relation)
			);

			CREATE TABLE IF NOT EXISTS chunk_entities (
				chunk_id TEXT NOT NULL,
				entity_id TEXT NOT NULL,
				document_id TEXT,
				PRIMARY KEY (chunk_id, entity_id)
			);

			CREATE INDEX IF NOT EXISTS idx_entities_type ON entities(type);
			CREATE INDEX IF NOT EXISTS idx_relations_from ON relations(from_id);
			CREATE INDEX IF NOT EXISTS idx_relations_to ON relations(to_id);
			CREATE INDEX IF NOT EXISTS idx_chunk_entities_entity ON chunk_entities(entity_id);
			CREATE INDEX IF NOT EXISTS idx_chunk_entities_document ON chunk_entities(document_id);
		`);
	}

	/**
	 * Add or update an entity
	 */
	addEntity(entity: EntityNode): void {
		this.db
			.prepare(`
				INSERT OR REPLACE INTO entities (id, type, name, metadata)
				VALUES (?, ?, ?, ?)
			`)
			.run(
				entity.id,
				entity.type,
				entity.name,
				entity.metadata ? JSON.stringify(entity.metadata) : null,
			);
	}

	/**
	 * Add a relation
	 */
	addRelation(edge: Omit<RelationEdge, "weight"> & { weight?: number }): void {
		this.db
			.prepare(`
				INSERT OR REPLACE INTO relations (from_id, to_id, relation, weight)
				VALUES (?, ?, ?, ?)
			`)
			.run(edge.from, edge.to, edge.relation, edge.weight ?? 1.0);
	}

	linkChunk(chunkId: string, entityId: string, documentId?: string): void {
		this.db
			.prepare(`
				INSERT OR REPLACE INTO chunk_entities (chunk_id, entity_id, document_id)
				VALUES (?, ?, ?)
			`)
			.run(chunkId, entityId, documentId ?? null);
	}

	unlinkDocument(documentId: string): number {
		const info = this.db
			.prepare("DELETE FROM chunk_entities WHERE document_id = ?")
			.run(documentId);
		return info.changes;
	}

	getEntity(entityId: string): EntityNode | null {
		const row = this.db
			.prepare("SELECT * FROM entities WHERE id = ?")
			.get(entityId) as EntityRow | undefined;
		if (!row) return null;

		return {
			id: row.id,
			type: row.type,
			name: row.name,
			metadata: row.metadata ? parseMetadata(row.metadata) : undefined,
		};
	}

	async getEntitiesForChunk(chunkId: string, signal?: AbortSignal): Promise<string[]> {
		signal?.throwIfAborted();
		const rows = this.db
			.prepare("SELECT entity_id FROM chunk_entities WHERE chunk_id = ? ORDER BY entity_id")
			.all(chunkId) as Array<{ entity_id: string }>;
		return rows.map((r) => r.entity_id);
	}

	async getChunksForEntity(entityId: string, limit = 50, signal?: AbortSignal): Promise<string[]> {
		signal?.throwIfAborted();
		const rows = this.db
			.prepare(`
				SELECT chunk_id FROM chunk_entities
				WHERE entity_id = ?
				ORDER BY chunk_id
				LIMIT ?
			`)
			.all(entityId, limit) as Array<{ chunk_id: string }>;
		return rows.map((r) => r.chunk_id);
	}

	async getNeighbors(entityId: string, query?: NeighborQuery, signal?: AbortSignal): Promise<NeighborEdge[]> {
		signal?.throwIfAborted();
		const incident = this.db.prepare(`
			SELECT from_id, to_id, relation, weight FROM relations
			WHERE from_id = ? OR to_id = ?
		`);

		return walkNeighbors(entityId, query, (id) => {
			const rows = incident.all(id, id) as RelationRow[];
			return rows.map((r) => ({
				from: r.from_id,
				to: r.to_id,
				relation: r.relation,
				weight: r.weight,
			}));
		});
	}

	/**
	 * Get graph statistics
	 */
	getStats(): GraphStats {
		const count = (sql: string) => (this.db.prepare(sql).get() as { count: number }).count;

		return {
			entityCount: count("SELECT COUNT(*) as count FROM entities"),
			relationCount: count("SELECT COUNT(*) as count FROM relations"),
			chunkLinkCount: count("SELECT COUNT(*) as count FROM chunk_entities"),
		};
	}

	/**
	 * Clear all data from the graph
	 */
	clear(): void {
		this.db.exec("DELETE FROM chunk_entities");
		this.db.exec("DELETE FROM relations");
		this.db.exec("DELETE FROM entities");
	}

	/**
	 * Close the database
	 */
	close(): void {
		this.db.close();
	}
}
