/**
 * Vector Index - exact cosine search over SQLite-stored embeddings
 *
 * Embeddings are stored as base64 Float32 and held in memory after the first
 * query. The in-memory copy is reloaded whenever the ingestion revision moves.
 */

import type { ChunkRecord, VectorIndex, VectorMatch } from "../types";
import { type ChunkRow, rowToChunk } from "./chunk-store";
import { matchesFilters } from "./filters";
import { getRevision, type RetrievalDatabase } from "./schema";

// ============================================================================
// Vector Math Utilities
// ============================================================================

/**
 * Cosine similarity in [-1, 1]; 0 when either vector has zero magnitude.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
	if (a.length !== b.length) {
		throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
	}

	let dotProduct = 0;
	let normA = 0;
	let normB = 0;

	for (let i = 0; i < a.length; i++) {
		dotProduct += a[i] * b[i];
		normA += a[i] * a[i];
		normB += b[i] * b[i];
	}

	const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
	if (magnitude === 0) return 0;

	return dotProduct / magnitude;
}

export function serializeEmbedding(embedding: readonly number[]): string {
	const buffer = new Float32Array(embedding);
	return Buffer.from(buffer.buffer, buffer.byteOffset, buffer.byteLength).toString("base64");
}

export function deserializeEmbedding(base64: string): number[] {
	const bytes = Buffer.from(base64, "base64");
	if (bytes.length % 4 !== 0) {
		throw new Error(`Corrupt embedding: ${bytes.length} bytes is not a multiple of 4`);
	}
	// Copy into an aligned buffer; Buffer pool slices may start at odd offsets
	const aligned = new Uint8Array(bytes);
	return Array.from(new Float32Array(aligned.buffer, 0, aligned.length / 4));
}

// ============================================================================
// Implementation
// ============================================================================

interface VectorRow extends ChunkRow {
	embedding: string;
}

interface LoadedVector {
	chunk: ChunkRecord;
	embedding: number[];
}

export interface SqliteVectorIndex extends VectorIndex {
	count(): number;
	/** Drop the in-memory copy; the next query reloads */
	invalidate(): void;
}

export function createVectorIndex(db: RetrievalDatabase): SqliteVectorIndex {
	const loadStmt = db.prepare(`
		SELECT v.embedding, c.*
		FROM vectors v
		JOIN chunks c ON c.id = v.chunk_id
		ORDER BY c.id
	`);
	const countStmt = db.prepare("SELECT COUNT(*) as count FROM vectors");

	let loaded: LoadedVector[] | null = null;
	let loadedRevision = -1;

	function load(): LoadedVector[] {
		const revision = getRevision(db);
		if (loaded && revision === loadedRevision) return loaded;

		const rows = loadStmt.all() as VectorRow[];
		loaded = rows.map((row) => ({
			chunk: rowToChunk(row),
			embedding: deserializeEmbedding(row.embedding),
		}));
		loadedRevision = revision;
		return loaded;
	}

	return {
		async query(embedding, topK, filters, signal): Promise<VectorMatch[]> {
			signal?.throwIfAborted();
			if (topK <= 0) return [];

			const results: VectorMatch[] = [];
			for (const item of load()) {
				if (!matchesFilters(item.chunk, filters)) continue;
				results.push({
					chunkId: item.chunk.id,
					similarity: cosineSimilarity(embedding, item.embedding),
				});
			}

			results.sort(
				(a, b) => b.similarity - a.similarity || (a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0),
			);
			return results.slice(0, topK);
		},

		count() {
			const row = countStmt.get() as { count: number };
			return row.count;
		},

		invalidate() {
			loaded = null;
		},
	};
}
