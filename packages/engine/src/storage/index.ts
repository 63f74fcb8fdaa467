/**
 * Storage module exports
 */

export {
	openDatabase,
	getSchemaVersion,
	getRevision,
	bumpRevision,
	SCHEMA_VERSION,
	type RetrievalDatabase,
} from "./schema";
export { createChunkStore, rowToChunk, type ChunkStore, type ChunkRow } from "./chunk-store";
export { createKeywordIndex, type SqliteKeywordIndex } from "./keyword-index";
export {
	createVectorIndex,
	cosineSimilarity,
	serializeEmbedding,
	deserializeEmbedding,
	type SqliteVectorIndex,
} from "./vector-index";
export { matchesFilters, hasFilters, isRangeFilter } from "./filters";
