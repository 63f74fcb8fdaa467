/**
 * Chunk Store - reads chunk text and metadata, ingestion-side writes
 */

import type { ChunkReader, ChunkRecord, MetadataValue } from "../types";
import type { RetrievalDatabase } from "./schema";

export interface ChunkRow {
	id: string;
	document_id: string;
	text: string;
	metadata: string;
	position: number;
	page: number | null;
	token_count: number;
}

export interface ChunkStore extends ChunkReader {
	getById(id: string): ChunkRecord | null;
	getByDocument(documentId: string): ChunkRecord[];
	/** Every chunk, in id order */
	getAll(): ChunkRecord[];
	upsert(chunk: ChunkRecord, tokenCount: number): void;
	deleteByDocument(documentId: string): number;
	count(): number;
}

export function rowToChunk(row: ChunkRow): ChunkRecord {
	const chunk: ChunkRecord = {
		id: row.id,
		documentId: row.document_id,
		text: row.text,
		metadata: parseMetadata(row.metadata),
		position: row.position,
	};
	if (row.page !== null) chunk.page = row.page;
	return chunk;
}

function parseMetadata(raw: string): Record<string, MetadataValue> {
	const parsed: unknown = JSON.parse(raw);
	if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) return {};

	const metadata: Record<string, MetadataValue> = {};
	for (const [key, value] of Object.entries(parsed)) {
		if (
			value === null ||
			typeof value === "string" ||
			typeof value === "number" ||
			typeof value === "boolean"
		) {
			metadata[key] = value;
		} else if (Array.isArray(value)) {
			metadata[key] = value.filter(
				(item): item is string | number => typeof item === "string" || typeof item === "number",
			);
		}
	}
	return metadata;
}

export function createChunkStore(db: RetrievalDatabase): ChunkStore {
	const upsertStmt = db.prepare(`
		INSERT OR REPLACE INTO chunks (id, document_id, text, metadata, position, page, token_count)
		VALUES (?, ?, ?, ?, ?, ?, ?)
	`);
	const getByIdStmt = db.prepare("SELECT * FROM chunks WHERE id = ?");
	const getByDocumentStmt = db.prepare("SELECT * FROM chunks WHERE document_id = ? ORDER BY position");
	const getAllStmt = db.prepare("SELECT * FROM chunks ORDER BY id");
	const deleteByDocumentStmt = db.prepare("DELETE FROM chunks WHERE document_id = ?");
	const countStmt = db.prepare("SELECT COUNT(*) as count FROM chunks");

	const store: ChunkStore = {
		async getChunks(ids, signal) {
			signal?.throwIfAborted();
			const result = new Map<string, ChunkRecord>();
			for (const id of ids) {
				const chunk = store.getById(id);
				if (chunk) result.set(id, chunk);
			}
			return result;
		},

		getById(id) {
			const row = getByIdStmt.get(id) as ChunkRow | undefined;
			return row ? rowToChunk(row) : null;
		},

		getByDocument(documentId) {
			const rows = getByDocumentStmt.all(documentId) as ChunkRow[];
			return rows.map(rowToChunk);
		},

		getAll() {
			const rows = getAllStmt.all() as ChunkRow[];
			return rows.map(rowToChunk);
		},

		upsert(chunk, tokenCount) {
			upsertStmt.run(
				chunk.id,
				chunk.documentId,
				chunk.text,
				JSON.stringify(chunk.metadata),
				chunk.position,
				chunk.page ?? null,
				tokenCount,
			);
		},

		deleteByDocument(documentId) {
			return deleteByDocumentStmt.run(documentId).changes;
		},

		count() {
			const row = countStmt.get() as { count: number };
			return row.count;
		},
	};

	return store;
}
