import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { VoyageAIClient } from "voyageai";
import { TransientBackendError } from "../errors";
import { createVoyageReranker, isVoyageRerankerAvailable } from "../query/voyage-reranker";

type VoyageRerankResponse = Awaited<ReturnType<VoyageAIClient["rerank"]>>;

describe("Voyage reranker", () => {
	const originalApiKey = process.env.VOYAGE_AI_API_KEY;

	beforeEach(() => {
		delete process.env.VOYAGE_AI_API_KEY;
	});

	afterEach(() => {
		if (originalApiKey === undefined) delete process.env.VOYAGE_AI_API_KEY;
		else process.env.VOYAGE_AI_API_KEY = originalApiKey;
		vi.restoreAllMocks();
	});

	test("availability check respects explicit key and env", () => {
		expect(isVoyageRerankerAvailable()).toBe(false);
		expect(isVoyageRerankerAvailable("explicit-key")).toBe(true);

		process.env.VOYAGE_AI_API_KEY = "env-key";
		expect(isVoyageRerankerAvailable()).toBe(true);
	});

	test("createVoyageReranker throws when API key is missing", () => {
		expect(() => createVoyageReranker()).toThrow(/VOYAGE_AI_API_KEY/);
	});

	test("empty document list short-circuits", async () => {
		const rerank = vi.spyOn(VoyageAIClient.prototype, "rerank");
		const reranker = createVoyageReranker({ apiKey: "test-key" });

		expect(await reranker.score("test", [])).toEqual([]);
		expect(rerank).not.toHaveBeenCalled();
	});

	test("maps relevance scores back to input order", async () => {
		const response: VoyageRerankResponse = {
			data: [
				{ index: 1, relevanceScore: 0.9 },
				{ index: 0, relevanceScore: 0.4 },
			],
		};
		const rerank = vi.spyOn(VoyageAIClient.prototype, "rerank").mockImplementation(async () => response);
		const reranker = createVoyageReranker({ apiKey: "test-key", model: "rerank-2.5-lite" });

		const scores = await reranker.score("test", ["alpha", "beta", "gamma"]);

		expect(reranker.name).toBe("voyageai/rerank-2.5-lite");
		expect(scores).toEqual([0.4, 0.9, null]);
		expect(rerank).toHaveBeenCalledWith(
			{
				model: "rerank-2.5-lite",
				query: "test",
				documents: ["alpha", "beta", "gamma"],
				topK: 3,
				returnDocuments: false,
			},
			expect.objectContaining({ maxRetries: 0 }),
		);
	});

	test("an empty response is a transient failure", async () => {
		const response: VoyageRerankResponse = { data: [] };
		vi.spyOn(VoyageAIClient.prototype, "rerank").mockImplementation(async () => response);
		const reranker = createVoyageReranker({ apiKey: "test-key" });

		await expect(reranker.score("test", ["alpha"])).rejects.toThrow(/empty response/i);
	});

	test("client errors surface as TransientBackendError", async () => {
		vi.spyOn(VoyageAIClient.prototype, "rerank").mockRejectedValue(new Error("503 Service Unavailable"));
		const reranker = createVoyageReranker({ apiKey: "test-key" });

		const error = await reranker.score("test", ["alpha"]).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(TransientBackendError);
		expect(error).toMatchObject({ backend: "reranker", message: "reranker: 503 Service Unavailable" });
	});
});
