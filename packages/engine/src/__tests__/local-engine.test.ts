import { afterEach, describe, expect, test } from "vitest";
import { parseConfig } from "../config";
import { createLogger } from "../diagnostics/logger";
import { buildTermStats } from "../ingestion/ingest";
import { createLocalSearchEngine, type LocalEngine } from "../local-engine";
import type { Chunk } from "../types";
import { NO_RETRY } from "./fixtures";

const TEXTS: Array<[string, string, string]> = [
	["c1", "doc1", "Reciprocal rank fusion merges ranked lists"],
	["c2", "doc1", "Dense vectors capture meaning"],
	["c3", "doc2", "Caches keep recent query results"],
];

async function ingest(local: LocalEngine, texts = TEXTS): Promise<void> {
	const embeddings = await local.embedder.embedBatch(texts.map(([, , text]) => text), { inputType: "document" });
	const chunks: Chunk[] = texts.map(([id, documentId, text], i) => ({
		id,
		documentId,
		text,
		embedding: embeddings[i],
		termStats: buildTermStats(text),
		metadata: {},
		position: i,
	}));
	local.writer.write(chunks);
}

describe("local search engine", () => {
	let local: LocalEngine | undefined;

	afterEach(() => {
		local?.close();
		local = undefined;
	});

	test("runs offline without an API key", async () => {
		const logger = createLogger({ console: false, storeEntries: true });
		local = createLocalSearchEngine({ config: parseConfig({ retry: NO_RETRY }), logger });
		await ingest(local);

		const response = await local.engine.search({ query: "rank fusion", searchType: "hybrid" });

		expect(local.embedder.modelId).toBe("simple-hash-embedder@384");
		expect(response.results[0].chunkId).toBe("c1");
		expect(response.results[0].sources).toEqual(["vector", "keyword"]);
		expect(response.degradedFlags).toEqual([]);
		expect(logger.getEntries().find((entry) => entry.message === "Local search engine ready")?.context).toEqual({
			embedder: "simple-hash-embedder@384",
			graph: false,
			rerank: true,
		});
	});

	test("ingestion invalidates cached results", async () => {
		local = createLocalSearchEngine({
			config: parseConfig({ retry: NO_RETRY }),
			logger: createLogger({ console: false }),
		});
		await ingest(local);
		const request = { query: "rank fusion", searchType: "hybrid" } as const;

		await local.engine.search(request);
		expect((await local.engine.search(request)).cached).toBe(true);

		await ingest(local, [["c1", "doc1", "Rank fusion, second edition"]]);
		const refreshed = await local.engine.search(request);

		expect(refreshed.cached).toBe(false);
		expect(refreshed.results[0].content).toBe("Rank fusion, second edition");
	});

	test("close shuts the database", () => {
		const opened = createLocalSearchEngine({
			config: parseConfig({ retry: NO_RETRY }),
			logger: createLogger({ console: false }),
		});

		opened.close();

		expect(opened.db.open).toBe(false);
	});
});
