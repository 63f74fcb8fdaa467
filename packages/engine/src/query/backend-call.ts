/**
 * Backend call wrapper shared by the pipeline stages: bounded retry with
 * backoff, wrapping failures as TransientBackendError. Caller aborts and stage
 * timeouts pass through untouched so the orchestrator can tell them apart.
 */

import type { Logger } from "../diagnostics/logger";
import type { RetrievalMetrics } from "../diagnostics/metrics";
import { type BackendName, TransientBackendError } from "../errors";
import { retryWithBackoff } from "../utils/async";

export interface RetryPolicy {
	attempts: number;
	baseDelayMs: number;
	maxDelayMs: number;
}

export interface StageResult<T> {
	value: T;
	degraded: boolean;
	error?: TransientBackendError;
}

export interface BackendCallContext {
	retry: RetryPolicy;
	logger: Logger;
	metrics?: RetrievalMetrics;
	signal?: AbortSignal;
}

export async function callBackend<T>(
	backend: BackendName,
	fn: (signal?: AbortSignal) => Promise<T>,
	context: BackendCallContext,
): Promise<T> {
	const { retry, logger, metrics, signal } = context;
	try {
		return await retryWithBackoff(() => fn(signal), {
			...retry,
			signal,
			onRetry(error, attempt, delayMs) {
				metrics?.backendRetries.inc();
				logger.debug("Retrying backend call", {
					backend,
					attempt,
					delayMs,
					error: error instanceof Error ? error.message : String(error),
				});
			},
		});
	} catch (error) {
		if (signal?.aborted) throw signal.reason ?? error;
		throw TransientBackendError.from(backend, error);
	}
}

/**
 * Degrade to `fallback` on a TransientBackendError; anything else (aborts,
 * timeouts) propagates.
 */
export async function degradeOnFailure<T>(
	stage: string,
	run: () => Promise<T>,
	fallback: T,
	logger: Logger,
): Promise<StageResult<T>> {
	try {
		return { value: await run(), degraded: false };
	} catch (error) {
		if (!(error instanceof TransientBackendError)) throw error;
		logger.warn(`${stage} degraded`, { backend: error.backend, error: error.message });
		return { value: fallback, degraded: true, error };
	}
}
