/**
 * Ingestion writer
 *
 * The engine never writes chunks itself. This is the writer side of the
 * reference indexes: it stores chunks, postings and vectors for whole
 * documents in one transaction and then notifies subscribers so caches can
 * drop entries derived from the old content.
 */

import type { GraphWriter } from "@hybrid-retrieval/knowledge-graph";
import { nullLogger, type Logger } from "../diagnostics/logger";
import { createChunkStore } from "../storage/chunk-store";
import { bumpRevision, type RetrievalDatabase } from "../storage/schema";
import { serializeEmbedding } from "../storage/vector-index";
import { tokenize } from "../text/tokenizer";
import type { Chunk, DocumentEvent, TermStats } from "../types";

export type DocumentEventListener = (event: DocumentEvent) => void;

export interface WriteOptions {
	/** Entity ids mentioned by each chunk, linked in the graph when one is attached */
	entityLinks?: Record<string, readonly string[]>;
}

export interface IngestionSummary {
	documents: number;
	chunks: number;
	postings: number;
	vectors: number;
}

export interface IngestionWriter {
	/**
	 * Replace the stored content of every document the chunks belong to.
	 * Chunks of one document must all be passed in the same call.
	 */
	write(chunks: readonly Chunk[], options?: WriteOptions): IngestionSummary;

	/** Remove a document; returns the number of chunks deleted */
	deleteDocument(documentId: string): number;

	/** Returns an unsubscribe function */
	subscribe(listener: DocumentEventListener): () => void;
}

export interface IngestionWriterOptions {
	/** Graph to keep chunk back-references in sync with */
	graph?: GraphWriter;
	logger?: Logger;
}

/**
 * Term statistics with the same tokenizer keyword search uses.
 */
export function buildTermStats(text: string): TermStats {
	const terms = tokenize(text);
	const frequencies: Record<string, number> = {};
	for (const term of terms) {
		frequencies[term] = (frequencies[term] ?? 0) + 1;
	}
	return { length: terms.length, frequencies };
}

export function createIngestionWriter(
	db: RetrievalDatabase,
	options: IngestionWriterOptions = {},
): IngestionWriter {
	const { graph, logger = nullLogger } = options;
	const log = logger.child({ component: "ingestion" });
	const chunks = createChunkStore(db);
	const listeners = new Set<DocumentEventListener>();

	const insertPosting = db.prepare("INSERT INTO kw_postings (term, chunk_id, tf) VALUES (?, ?, ?)");
	const insertVector = db.prepare(
		"INSERT OR REPLACE INTO vectors (chunk_id, embedding, dimension) VALUES (?, ?, ?)",
	);

	function publish(event: DocumentEvent): void {
		for (const listener of listeners) {
			try {
				listener(event);
			} catch (error) {
				log.error("Document event listener failed", error, { ...event });
			}
		}
	}

	const writeTransaction = db.transaction((batch: readonly Chunk[], documentIds: string[]) => {
		const summary: IngestionSummary = { documents: documentIds.length, chunks: 0, postings: 0, vectors: 0 };

		// Postings and vectors cascade with their chunks
		for (const documentId of documentIds) {
			chunks.deleteByDocument(documentId);
		}

		for (const chunk of batch) {
			chunks.upsert(chunk, chunk.termStats.length);
			summary.chunks++;

			for (const [term, tf] of Object.entries(chunk.termStats.frequencies)) {
				insertPosting.run(term, chunk.id, tf);
				summary.postings++;
			}

			if (chunk.embedding.length > 0) {
				insertVector.run(chunk.id, serializeEmbedding(chunk.embedding), chunk.embedding.length);
				summary.vectors++;
			}
		}

		bumpRevision(db);
		return summary;
	});

	const deleteTransaction = db.transaction((documentId: string) => {
		const removed = chunks.deleteByDocument(documentId);
		bumpRevision(db);
		return removed;
	});

	return {
		write(batch, writeOptions = {}) {
			const documentIds = [...new Set(batch.map((chunk) => chunk.documentId))];
			const summary = writeTransaction(batch, documentIds);

			if (graph) {
				for (const documentId of documentIds) graph.unlinkDocument(documentId);
				for (const chunk of batch) {
					for (const entityId of writeOptions.entityLinks?.[chunk.id] ?? []) {
						graph.linkChunk(chunk.id, entityId, chunk.documentId);
					}
				}
			}

			log.info("Indexed documents", { ...summary });
			for (const documentId of documentIds) {
				publish({ type: "updated", documentId });
			}
			return summary;
		},

		deleteDocument(documentId) {
			const removed = deleteTransaction(documentId);
			graph?.unlinkDocument(documentId);
			log.info("Deleted document", { documentId, chunks: removed });
			publish({ type: "deleted", documentId });
			return removed;
		},

		subscribe(listener) {
			listeners.add(listener);
			return () => {
				listeners.delete(listener);
			};
		},
	};
}
