import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { VoyageAIClient } from "voyageai";
import { createSimpleEmbedder } from "../embeddings/simple-embedder";
import { createVoyageEmbedder, isVoyageAvailable } from "../embeddings/voyage-embedder";
import { TransientBackendError } from "../errors";

type VoyageEmbedResponse = Awaited<ReturnType<VoyageAIClient["embed"]>>;

function norm(vector: number[]): number {
	return Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
}

describe("simple embedder", () => {
	const embedder = createSimpleEmbedder();

	test("is deterministic and unit length", async () => {
		const first = await embedder.embed("hybrid retrieval ranking");
		const second = await embedder.embed("hybrid retrieval ranking");

		expect(first).toEqual(second);
		expect(first).toHaveLength(384);
		expect(norm(first)).toBeCloseTo(1, 5);
		expect(embedder.modelId).toBe("simple-hash-embedder@384");
	});

	test("inflected forms share a vector", async () => {
		expect(await embedder.embed("Ranking")).toEqual(await embedder.embed("ranked"));
	});

	test("text without terms embeds to zeros", async () => {
		const vector = await embedder.embed("the and of");
		expect(vector.every((value) => value === 0)).toBe(true);
	});

	test("batches match single embeddings", async () => {
		const batch = await embedder.embedBatch(["alpha", "beta"]);
		expect(batch).toEqual([await embedder.embed("alpha"), await embedder.embed("beta")]);
	});
});

describe("Voyage embedder", () => {
	const originalApiKey = process.env.VOYAGE_AI_API_KEY;

	beforeEach(() => {
		delete process.env.VOYAGE_AI_API_KEY;
	});

	afterEach(() => {
		if (originalApiKey === undefined) delete process.env.VOYAGE_AI_API_KEY;
		else process.env.VOYAGE_AI_API_KEY = originalApiKey;
		vi.restoreAllMocks();
	});

	test("needs an API key", () => {
		expect(isVoyageAvailable()).toBe(false);
		expect(isVoyageAvailable("test-key")).toBe(true);
		expect(() => createVoyageEmbedder()).toThrow(/VOYAGE_AI_API_KEY/);
	});

	test("skips blank inputs and restores input order", async () => {
		const response: VoyageEmbedResponse = {
			data: [
				{ index: 1, embedding: [0, 1] },
				{ index: 0, embedding: [1, 0] },
			],
		};
		const embed = vi.spyOn(VoyageAIClient.prototype, "embed").mockImplementation(async () => response);
		const embedder = createVoyageEmbedder({ apiKey: "test-key", dimensions: 2 });

		const vectors = await embedder.embedBatch(["alpha", "  ", "beta"], { inputType: "document" });

		expect(vectors).toEqual([
			[1, 0],
			[0, 0],
			[0, 1],
		]);
		expect(embedder.modelId).toBe("voyageai/voyage-3@2");
		expect(embed).toHaveBeenCalledWith(
			{ model: "voyage-3", input: ["alpha", "beta"], inputType: "document", outputDimension: 2, truncation: true },
			expect.objectContaining({ maxRetries: 0 }),
		);
	});

	test("a missing embedding is a transient failure", async () => {
		const response: VoyageEmbedResponse = { data: [] };
		vi.spyOn(VoyageAIClient.prototype, "embed").mockImplementation(async () => response);
		const embedder = createVoyageEmbedder({ apiKey: "test-key" });

		await expect(embedder.embed("alpha")).rejects.toThrow(
			"embedding-provider: no embedding returned for input 0 (model voyage-3)",
		);
	});

	test("client errors surface as TransientBackendError", async () => {
		vi.spyOn(VoyageAIClient.prototype, "embed").mockRejectedValue(new Error("429 Too Many Requests"));
		const embedder = createVoyageEmbedder({ apiKey: "test-key" });

		const error = await embedder.embed("alpha").catch((e: unknown) => e);

		expect(error).toBeInstanceOf(TransientBackendError);
		expect(error).toMatchObject({ backend: "embedding-provider", message: "embedding-provider: 429 Too Many Requests" });
	});
});
