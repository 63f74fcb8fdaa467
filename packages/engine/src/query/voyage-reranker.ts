/**
 * Voyage AI Reranker
 *
 * Scores come back sorted by relevance and are mapped to input order.
 * Documents the API leaves out score `null`.
 */

import { VoyageAIClient } from "voyageai";
import { TransientBackendError } from "../errors";
import type { RerankerService } from "./reranker";

export interface VoyageRerankerOptions {
	/** API key (default: VOYAGE_AI_API_KEY) */
	apiKey?: string;
	/** Rerank model (default: "rerank-2.5") */
	model?: string;
	/** Client-side request timeout in seconds; the rerank stage budget is usually shorter (default: 15) */
	timeoutSeconds?: number;
}

const DEFAULT_MODEL = "rerank-2.5";
const DEFAULT_TIMEOUT_SECONDS = 15;

type VoyageRerankResponse = Awaited<ReturnType<VoyageAIClient["rerank"]>>;

export function isVoyageRerankerAvailable(apiKey?: string): boolean {
	return Boolean(apiKey ?? process.env.VOYAGE_AI_API_KEY);
}

export function createVoyageReranker(options: VoyageRerankerOptions = {}): RerankerService {
	const apiKey = options.apiKey ?? process.env.VOYAGE_AI_API_KEY;
	if (!apiKey) {
		throw new Error("Voyage AI reranking needs an API key: pass apiKey or set VOYAGE_AI_API_KEY");
	}

	const model = options.model ?? DEFAULT_MODEL;
	const timeoutSeconds = options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
	const client = new VoyageAIClient({ apiKey });

	return {
		name: `voyageai/${model}`,

		async score(query, documents, signal) {
			if (documents.length === 0) return [];

			let response: VoyageRerankResponse;
			try {
				response = await client.rerank(
					{ model, query, documents, topK: documents.length, returnDocuments: false },
					{ timeoutInSeconds: timeoutSeconds, maxRetries: 0, abortSignal: signal },
				);
			} catch (error) {
				if (signal?.aborted) throw error;
				throw TransientBackendError.from("reranker", error);
			}

			if (!response.data || response.data.length === 0) {
				throw new TransientBackendError("reranker", `empty response for model ${model}`);
			}

			const byIndex = new Map<number, number>();
			for (const { index, relevanceScore } of response.data) {
				if (index !== undefined && relevanceScore !== undefined) byIndex.set(index, relevanceScore);
			}
			return documents.map((_document, index) => byIndex.get(index) ?? null);
		},
	};
}
