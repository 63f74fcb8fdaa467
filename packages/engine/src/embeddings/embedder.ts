/**
 * Embedder Interface
 *
 * Contract for embedding providers. `modelId` doubles as the version tag of
 * query-embedding cache keys, so it must change whenever vectors would.
 */

export interface EmbedOptions {
	/**
	 * The type of input being embedded.
	 * - 'document': content being indexed
	 * - 'query': search queries
	 * Providers without asymmetric embeddings ignore this.
	 */
	inputType?: "query" | "document";

	/** Cancels the request when aborted */
	signal?: AbortSignal;
}

export interface Embedder {
	embed(text: string, options?: EmbedOptions): Promise<number[]>;

	/** Embeddings in input order */
	embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]>;

	readonly dimension: number;

	readonly modelId: string;
}
