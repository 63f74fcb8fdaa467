/**
 * Async control helpers: abortable sleep, timeouts with linked cancellation,
 * and retry with exponential backoff.
 */

import { isAbortError } from "../errors";

export class TimeoutError extends Error {
	constructor(
		readonly label: string,
		readonly timeoutMs: number,
	) {
		super(`${label} timed out after ${timeoutMs}ms`);
		this.name = "TimeoutError";
	}
}

/** Abort reason, defaulting to a standard AbortError */
function abortReason(signal: AbortSignal): unknown {
	return signal.reason ?? new DOMException("The operation was aborted", "AbortError");
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(abortReason(signal));
			return;
		}

		const onAbort = () => {
			clearTimeout(timer);
			reject(signal ? abortReason(signal) : undefined);
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

/**
 * Run `task` with its own abort signal that fires when `timeoutMs` elapses or
 * when `parent` aborts, whichever comes first. The returned promise settles as
 * soon as either happens, without waiting for the task to notice.
 */
export function runWithTimeout<T>(
	task: (signal: AbortSignal) => Promise<T>,
	options: { timeoutMs: number; label: string; signal?: AbortSignal },
): Promise<T> {
	const { timeoutMs, label, signal: parent } = options;

	return new Promise<T>((resolve, reject) => {
		if (parent?.aborted) {
			reject(abortReason(parent));
			return;
		}

		const controller = new AbortController();

		const onParentAbort = () => {
			const reason = parent ? abortReason(parent) : undefined;
			controller.abort(reason);
			reject(reason);
		};

		const timer = setTimeout(() => {
			const error = new TimeoutError(label, timeoutMs);
			controller.abort(error);
			reject(error);
		}, timeoutMs);

		parent?.addEventListener("abort", onParentAbort, { once: true });

		const cleanup = () => {
			clearTimeout(timer);
			parent?.removeEventListener("abort", onParentAbort);
		};

		void Promise.resolve()
			.then(() => task(controller.signal))
			.then(
				(value) => {
					cleanup();
					resolve(value);
				},
				(error: unknown) => {
					cleanup();
					reject(error);
				},
			);
	});
}

export interface RetryOptions {
	/** Total attempts including the first (default: 3) */
	attempts?: number;
	/** Delay before the second attempt, doubled each time (default: 100) */
	baseDelayMs?: number;
	/** Upper bound for a single delay (default: 2000) */
	maxDelayMs?: number;
	/** Stops retrying and rethrows the abort reason once aborted */
	signal?: AbortSignal;
	/** Called before each backoff wait */
	onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Exponential backoff. Abort errors are never retried.
 */
export async function retryWithBackoff<T>(
	fn: (attempt: number) => Promise<T>,
	options: RetryOptions = {},
): Promise<T> {
	const { attempts = 3, baseDelayMs = 100, maxDelayMs = 2000, signal, onRetry } = options;
	let lastError: unknown = new Error("retryWithBackoff: no attempts made");

	for (let attempt = 1; attempt <= Math.max(1, attempts); attempt++) {
		if (signal?.aborted) throw abortReason(signal);

		try {
			return await fn(attempt);
		} catch (error) {
			if (signal?.aborted) throw abortReason(signal);
			if (isAbortError(error)) throw error;

			lastError = error;
			if (attempt >= attempts) break;

			const delay = Math.min(maxDelayMs, baseDelayMs * Math.pow(2, attempt - 1));
			onRetry?.(error, attempt, delay);
			await sleep(delay, signal);
		}
	}

	throw lastError;
}
