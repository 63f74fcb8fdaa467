/**
 * Embeddings Module
 *
 * Voyage AI embedder and a deterministic hash-based fallback.
 */

export type { Embedder, EmbedOptions } from "./embedder";

export {
	createVoyageEmbedder,
	isVoyageAvailable,
	type VoyageEmbedderOptions,
} from "./voyage-embedder";

export { SimpleEmbedder, createSimpleEmbedder, createHashEmbedding } from "./simple-embedder";
