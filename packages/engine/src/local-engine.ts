/**
 * Local engine wiring
 *
 * Builds a search engine over the SQLite reference indexes. With a Voyage AI
 * key the hosted embedder and reranker are used; without one the engine runs
 * fully offline on the hash embedder and the lexical reranker.
 */

import type { GraphStore, GraphWriter } from "@hybrid-retrieval/knowledge-graph";
import { loadConfig, type EngineConfig } from "./config";
import { createLogger, type Logger } from "./diagnostics/logger";
import { createRetrievalMetrics, type RetrievalMetrics } from "./diagnostics/metrics";
import type { Embedder } from "./embeddings/embedder";
import { createSimpleEmbedder } from "./embeddings/simple-embedder";
import { createVoyageEmbedder } from "./embeddings/voyage-embedder";
import { createIngestionWriter, type IngestionWriter } from "./ingestion/ingest";
import { createLexicalReranker, type RerankerService } from "./query/reranker";
import { createSearchEngine, type SearchEngine } from "./query/search-engine";
import { createVoyageReranker } from "./query/voyage-reranker";
import { createChunkStore, type ChunkStore } from "./storage/chunk-store";
import { createKeywordIndex } from "./storage/keyword-index";
import { getRevision, openDatabase, type RetrievalDatabase } from "./storage/schema";
import { createVectorIndex } from "./storage/vector-index";

export interface LocalEngineOptions {
	/** SQLite file, or ":memory:" (default: ":memory:") */
	dbPath?: string;
	/** Already opened database; takes precedence over dbPath */
	db?: RetrievalDatabase;
	/** Resolved configuration (default: loadConfig() from the environment) */
	config?: EngineConfig;
	/** Knowledge graph used for expansion and kept in sync by ingestion */
	graph?: GraphStore & GraphWriter;
	/** Overrides the embedder chosen from the configuration */
	embedder?: Embedder;
	/** Overrides the reranker chosen from the configuration */
	reranker?: RerankerService;
	logger?: Logger;
	metrics?: RetrievalMetrics;
}

export interface LocalEngine {
	engine: SearchEngine;
	/** Ingestion side; its document events invalidate the engine cache */
	writer: IngestionWriter;
	chunks: ChunkStore;
	embedder: Embedder;
	db: RetrievalDatabase;
	config: EngineConfig;
	logger: Logger;
	metrics: RetrievalMetrics;
	/** Stop background work, flush the cache and close the database */
	close(): void;
}

function chooseEmbedder(config: EngineConfig): Embedder {
	const { apiKey, embeddingDimension } = config.voyage;
	if (!apiKey) return createSimpleEmbedder();
	return createVoyageEmbedder({
		apiKey,
		model: config.versions.embeddingModel,
		dimensions: embeddingDimension,
	});
}

function chooseReranker(config: EngineConfig): RerankerService {
	const { apiKey, rerankModel } = config.voyage;
	if (!apiKey) return createLexicalReranker(config.bm25);
	return createVoyageReranker({ apiKey, model: rerankModel });
}

export function createLocalSearchEngine(options: LocalEngineOptions = {}): LocalEngine {
	const config = options.config ?? loadConfig();
	const logger = options.logger ?? createLogger({ level: config.logLevel });
	const metrics = options.metrics ?? createRetrievalMetrics();
	const db = options.db ?? openDatabase(options.dbPath);

	const chunks = createChunkStore(db);
	const embedder = options.embedder ?? chooseEmbedder(config);

	const engine = createSearchEngine({
		vectorIndex: createVectorIndex(db),
		keywordIndex: createKeywordIndex(db),
		chunks,
		embedder,
		indexRevision: () => getRevision(db),
		graph: options.graph,
		reranker: options.reranker ?? chooseReranker(config),
		config,
		logger,
		metrics,
	});

	const writer = createIngestionWriter(db, { graph: options.graph, logger });
	const unsubscribe = writer.subscribe((event) => {
		engine.handleDocumentEvent(event);
	});

	logger.info("Local search engine ready", {
		embedder: embedder.modelId,
		graph: options.graph !== undefined && config.graph.enabled,
		rerank: config.rerank.enabled,
	});

	return {
		engine,
		writer,
		chunks,
		embedder,
		db,
		config,
		logger,
		metrics,
		close() {
			unsubscribe();
			engine.stop();
			db.close();
		},
	};
}
