/**
 * Voyage AI Embedder
 *
 * Query and document input types are passed through so the asymmetric Voyage
 * models embed each side correctly. Requests are split at the API's batch
 * limit; caching is left to the engine's cache manager.
 */

import { VoyageAIClient } from "voyageai";
import { TransientBackendError } from "../errors";
import type { Embedder, EmbedOptions } from "./embedder";

export interface VoyageEmbedderOptions {
	/** API key (default: VOYAGE_AI_API_KEY) */
	apiKey?: string;
	/** Embedding model (default: "voyage-3") */
	model?: string;
	/** Output dimension; the model must support it (default: 1024) */
	dimensions?: number;
	/** Per-request timeout in seconds (default: 30) */
	timeoutSeconds?: number;
}

const DEFAULT_MODEL = "voyage-3";
const DEFAULT_DIMENSIONS = 1024;
const DEFAULT_TIMEOUT_SECONDS = 30;

/** Inputs per embed request accepted by the API */
const MAX_BATCH_SIZE = 128;

type VoyageEmbedResponse = Awaited<ReturnType<VoyageAIClient["embed"]>>;

export function isVoyageAvailable(apiKey?: string): boolean {
	return Boolean(apiKey ?? process.env.VOYAGE_AI_API_KEY);
}

export function createVoyageEmbedder(options: VoyageEmbedderOptions = {}): Embedder {
	const apiKey = options.apiKey ?? process.env.VOYAGE_AI_API_KEY;
	if (!apiKey) {
		throw new Error("Voyage AI embeddings need an API key: pass apiKey or set VOYAGE_AI_API_KEY");
	}

	const model = options.model ?? DEFAULT_MODEL;
	const dimension = options.dimensions ?? DEFAULT_DIMENSIONS;
	const timeoutInSeconds = options.timeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
	const client = new VoyageAIClient({ apiKey });

	async function request(input: string[], embedOptions: EmbedOptions): Promise<VoyageEmbedResponse> {
		try {
			return await client.embed(
				{ model, input, inputType: embedOptions.inputType, outputDimension: dimension, truncation: true },
				{ timeoutInSeconds, maxRetries: 0, abortSignal: embedOptions.signal },
			);
		} catch (error) {
			if (embedOptions.signal?.aborted) throw error;
			throw TransientBackendError.from("embedding-provider", error);
		}
	}

	const embedder: Embedder = {
		dimension,
		modelId: `voyageai/${model}@${dimension}`,

		async embed(text, embedOptions) {
			const [vector] = await embedder.embedBatch([text], embedOptions);
			return vector;
		},

		// Blank inputs map to zero vectors and are never sent
		async embedBatch(texts, embedOptions = {}) {
			const vectors = new Map<number, number[]>();
			const toSend: number[] = [];
			texts.forEach((text, position) => {
				if (text.trim() === "") vectors.set(position, new Array<number>(dimension).fill(0));
				else toSend.push(position);
			});

			for (let offset = 0; offset < toSend.length; offset += MAX_BATCH_SIZE) {
				const positions = toSend.slice(offset, offset + MAX_BATCH_SIZE);
				const response = await request(
					positions.map((position) => texts[position]),
					embedOptions,
				);
				for (const item of response.data ?? []) {
					const position = item.index === undefined ? undefined : positions[item.index];
					if (position !== undefined && item.embedding && item.embedding.length > 0) {
						vectors.set(position, item.embedding);
					}
				}
			}

			return texts.map((_text, position) => {
				const vector = vectors.get(position);
				if (!vector) {
					throw new TransientBackendError(
						"embedding-provider",
						`no embedding returned for input ${position} (model ${model})`,
					);
				}
				return vector;
			});
		},
	};

	return embedder;
}
