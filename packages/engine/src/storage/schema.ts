/**
 * SQLite Schema for the reference indexes
 *
 * Uses better-sqlite3. Keyword postings are plain tables scored in JS with
 * BM25; vectors are base64 Float32 blobs scored with cosine similarity.
 */

import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

// Current schema version - increment when schema changes
export const SCHEMA_VERSION = 1;

// ============================================================================
// Schema SQL
// ============================================================================

const SCHEMA_SQL = `
PRAGMA foreign_keys = ON;

-- Schema metadata for versioning and change tracking
CREATE TABLE IF NOT EXISTS schema_metadata (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS chunks (
    id TEXT PRIMARY KEY,
    document_id TEXT NOT NULL,
    text TEXT NOT NULL,
    metadata TEXT NOT NULL DEFAULT '{}',
    position INTEGER NOT NULL,
    page INTEGER,
    token_count INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_chunks_document ON chunks(document_id);

-- Inverted index: one row per (term, chunk)
CREATE TABLE IF NOT EXISTS kw_postings (
    term TEXT NOT NULL,
    chunk_id TEXT NOT NULL,
    tf INTEGER NOT NULL,
    PRIMARY KEY (term, chunk_id),
    FOREIGN KEY (chunk_id) REFERENCES chunks(id) ON DELETE CASCADE
);

CREATE INDEX IF NOT EXISTS idx_kw_postings_chunk ON kw_postings(chunk_id);

CREATE TABLE IF NOT EXISTS vectors (
    chunk_id TEXT PRIMARY KEY,
    embedding TEXT NOT NULL,
    dimension INTEGER NOT NULL,
    FOREIGN KEY (chunk_id) REFERENCES chunks(id) ON DELETE CASCADE
);
`;

export type RetrievalDatabase = Database.Database;

// ============================================================================
// Setup
// ============================================================================

/**
 * Open (or create) a database with the reference schema applied.
 */
export function openDatabase(dbPath = ":memory:"): RetrievalDatabase {
	if (dbPath !== ":memory:") {
		const dir = dirname(dbPath);
		if (!existsSync(dir)) {
			mkdirSync(dir, { recursive: true });
		}
	}

	const db = new Database(dbPath);
	if (dbPath !== ":memory:") {
		// WAL for concurrent readers alongside the ingestion writer
		db.pragma("journal_mode = WAL");
		db.pragma("synchronous = NORMAL");
	}
	db.exec(SCHEMA_SQL);

	const setMeta = db.prepare("INSERT OR IGNORE INTO schema_metadata (key, value) VALUES (?, ?)");
	setMeta.run("schema_version", String(SCHEMA_VERSION));
	setMeta.run("revision", "0");

	return db;
}

export function getSchemaVersion(db: RetrievalDatabase): number {
	const row = db.prepare("SELECT value FROM schema_metadata WHERE key = 'schema_version'").get() as
		| { value: string }
		| undefined;
	return row ? Number(row.value) : 0;
}

/**
 * Monotonic counter bumped by every ingestion write. Readers holding derived
 * in-memory state compare it to know when to reload.
 */
export function getRevision(db: RetrievalDatabase): number {
	const row = db.prepare("SELECT value FROM schema_metadata WHERE key = 'revision'").get() as
		| { value: string }
		| undefined;
	return row ? Number(row.value) : 0;
}

export function bumpRevision(db: RetrievalDatabase): number {
	db.prepare("UPDATE schema_metadata SET value = CAST(value AS INTEGER) + 1 WHERE key = 'revision'").run();
	return getRevision(db);
}
