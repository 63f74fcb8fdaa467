export {
	buildTermStats,
	createIngestionWriter,
	type DocumentEventListener,
	type IngestionSummary,
	type IngestionWriter,
	type IngestionWriterOptions,
	type WriteOptions,
} from "./ingest";
