/**
 * Simple Embedder - deterministic hashing embedder
 *
 * Offline fallback and test embedder. Tokens go through the engine tokenizer,
 * so inflected forms of a word land on the same dimensions.
 */

import { tokenize } from "../text/tokenizer";
import type { Embedder } from "./embedder";

const DEFAULT_DIMENSION = 384;

/** 32-bit string hash (Java-style) */
function hashString(str: string): number {
	let hash = 0;
	for (let i = 0; i < str.length; i++) {
		hash = ((hash << 5) - hash + str.charCodeAt(i)) | 0;
	}
	return hash;
}

function addFeature(vector: Float32Array, feature: string, weight: number): void {
	const hash = hashString(feature);
	vector[Math.abs(hash) % vector.length] += (hash >= 0 ? 1 : -1) * weight;
}

/**
 * Hash each term onto a few signed dimensions, add bigram features, and
 * normalize to a unit vector.
 */
export function createHashEmbedding(text: string, dimension = DEFAULT_DIMENSION): number[] {
	const terms = tokenize(text);
	const vector = new Float32Array(dimension);

	for (const term of terms) {
		addFeature(vector, term, 0.5);
		addFeature(vector, `${term}#1`, 0.3);
		addFeature(vector, `${term}#2`, 0.2);
	}
	for (let i = 0; i < terms.length - 1; i++) {
		addFeature(vector, `${terms[i]}_${terms[i + 1]}`, 0.4);
	}

	let norm = 0;
	for (const value of vector) norm += value * value;
	norm = Math.sqrt(norm);
	if (norm > 0) {
		for (let i = 0; i < dimension; i++) vector[i] /= norm;
	}

	return Array.from(vector);
}

export class SimpleEmbedder implements Embedder {
	readonly dimension: number;
	readonly modelId: string;

	constructor(dimension = DEFAULT_DIMENSION) {
		this.dimension = dimension;
		this.modelId = `simple-hash-embedder@${dimension}`;
	}

	async embed(text: string): Promise<number[]> {
		return createHashEmbedding(text, this.dimension);
	}

	async embedBatch(texts: string[]): Promise<number[][]> {
		return texts.map((text) => createHashEmbedding(text, this.dimension));
	}
}

export function createSimpleEmbedder(dimension?: number): SimpleEmbedder {
	return new SimpleEmbedder(dimension);
}
