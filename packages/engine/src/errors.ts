/**
 * Error taxonomy
 *
 * ValidationError is rejected up front. TransientBackendError is retried at the
 * component boundary and then degrades the component. FatalPipelineError is the
 * only failure surfaced for a well-formed query.
 */

export type BackendName =
	| "vector-index"
	| "keyword-index"
	| "graph-store"
	| "embedding-provider"
	| "reranker";

export type RetrievalErrorCode = "VALIDATION" | "TRANSIENT_BACKEND" | "FATAL_PIPELINE";

export abstract class RetrievalError extends Error {
	abstract readonly code: RetrievalErrorCode;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class ValidationError extends RetrievalError {
	readonly code = "VALIDATION" as const;

	constructor(
		message: string,
		readonly issues: string[] = [message],
	) {
		super(message);
	}
}

export class TransientBackendError extends RetrievalError {
	readonly code = "TRANSIENT_BACKEND" as const;

	constructor(
		readonly backend: BackendName,
		message: string,
		options?: { cause?: unknown },
	) {
		super(`${backend}: ${message}`, options);
	}

	/** Wrap any failure from a backend call, keeping existing transient errors as-is */
	static from(backend: BackendName, error: unknown): TransientBackendError {
		if (error instanceof TransientBackendError) return error;
		const message = error instanceof Error ? error.message : String(error);
		return new TransientBackendError(backend, message, { cause: error });
	}
}

export class FatalPipelineError extends RetrievalError {
	readonly code = "FATAL_PIPELINE" as const;

	constructor(
		message: string,
		readonly failures: TransientBackendError[] = [],
	) {
		super(message);
	}
}

export function isAbortError(error: unknown): boolean {
	return error instanceof Error && error.name === "AbortError";
}
