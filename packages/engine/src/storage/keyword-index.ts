/**
 * Keyword Index - term postings over SQLite
 *
 * Returns raw term statistics; BM25 scoring happens in the keyword searcher.
 * Corpus statistics (N, average length, document frequencies) are computed
 * over the whole index so scores do not shift with the filters applied.
 */

import type { KeywordIndex, KeywordQueryResult, TermMatch } from "../types";
import { type ChunkRow, rowToChunk } from "./chunk-store";
import { hasFilters, matchesFilters } from "./filters";
import type { RetrievalDatabase } from "./schema";

/** Safety bound on matched chunks returned for one query */
const DEFAULT_MATCH_LIMIT = 10_000;

interface PostingRow extends ChunkRow {
	term: string;
	tf: number;
}

export interface SqliteKeywordIndex extends KeywordIndex {
	/** Distinct indexed terms */
	vocabularySize(): number;
}

export function createKeywordIndex(db: RetrievalDatabase): SqliteKeywordIndex {
	const corpusStmt = db.prepare(
		"SELECT COUNT(*) as total, COALESCE(AVG(token_count), 0) as avg_length FROM chunks",
	);
	const dfStmt = db.prepare("SELECT COUNT(*) as df FROM kw_postings WHERE term = ?");
	const vocabularyStmt = db.prepare("SELECT COUNT(DISTINCT term) as count FROM kw_postings");

	function postingsFor(terms: string[]): PostingRow[] {
		const placeholders = terms.map(() => "?").join(", ");
		return db
			.prepare(`
				SELECT p.term, p.tf, c.*
				FROM kw_postings p
				JOIN chunks c ON c.id = p.chunk_id
				WHERE p.term IN (${placeholders})
				ORDER BY c.id
			`)
			.all(...terms) as PostingRow[];
	}

	return {
		async query(terms, options = {}): Promise<KeywordQueryResult> {
			const { filters, limit = DEFAULT_MATCH_LIMIT, signal } = options;
			signal?.throwIfAborted();
			const unique = [...new Set(terms)];

			const corpusRow = corpusStmt.get() as { total: number; avg_length: number };
			const documentFrequencies: Record<string, number> = {};
			for (const term of unique) {
				const row = dfStmt.get(term) as { df: number };
				documentFrequencies[term] = row.df;
			}
			const corpus = {
				totalChunks: corpusRow.total,
				averageLength: corpusRow.avg_length,
				documentFrequencies,
			};

			if (unique.length === 0) return { matches: [], corpus };

			const byChunk = new Map<string, TermMatch>();
			const rejected = new Set<string>();
			const filtered = hasFilters(filters);

			for (const row of postingsFor(unique)) {
				if (rejected.has(row.id)) continue;

				let match = byChunk.get(row.id);
				if (!match) {
					if (filtered && !matchesFilters(rowToChunk(row), filters)) {
						rejected.add(row.id);
						continue;
					}
					if (byChunk.size >= limit) break;
					match = { chunkId: row.id, length: row.token_count, frequencies: {} };
					byChunk.set(row.id, match);
				}
				match.frequencies[row.term] = row.tf;
			}

			return { matches: [...byChunk.values()], corpus };
		},

		vocabularySize() {
			const row = vocabularyStmt.get() as { count: number };
			return row.count;
		},
	};
}
