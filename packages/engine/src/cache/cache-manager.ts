/**
 * Cache Manager - TTL cache with single-flight computation
 *
 * One manager owns any number of typed regions (query embeddings, query
 * results, ...). Each region:
 * - serves live entries and recomputes expired ones (lazy expiry)
 * - runs at most one computation per key; concurrent callers join it, and the
 *   computation is aborted once every caller waiting on it has aborted
 * - registers entries against document ids for targeted invalidation
 *
 * The manager adds the background sweep, document events and shutdown flush.
 */

import type { RetrievalMetrics } from "../diagnostics/metrics";
import { nullLogger, type Logger } from "../diagnostics/logger";
import type { DocumentEvent } from "../types";

// ============================================================================
// Types
// ============================================================================

export interface CacheEntry<T> {
	readonly key: string;
	readonly value: T;
	readonly createdAt: number;
	readonly ttlMs: number;
	readonly documentIds: readonly string[];
}

export interface GetOrComputeOptions<T> {
	/** Overrides the region TTL for this entry */
	ttlMs?: number;
	/**
	 * Documents the value depends on, known up front or derived from the value.
	 * While such a computation is in flight, any document invalidation marks it
	 * stale.
	 */
	documentIds?: readonly string[] | ((value: T) => readonly string[]);
	/** Values failing the check are returned to callers but not stored */
	shouldCommit?: (value: T) => boolean;
	/** Rejects this caller only; a shared computation keeps running while anyone else waits */
	signal?: AbortSignal;
}

export interface CacheLookup<T> {
	value: T;
	/** "hit" for a live entry, "joined" when awaiting another caller's computation */
	status: "hit" | "miss" | "joined";
}

export interface CacheRegionOptions {
	/** Default TTL for entries in this region (default: manager defaultTtlMs) */
	ttlMs?: number;
	/** Maximum live entries before oldest-first eviction (default: manager maxEntries) */
	maxEntries?: number;
}

export interface CacheRegion<T> {
	readonly name: string;

	/** `compute` gets a signal that aborts when every waiting caller has aborted */
	getOrCompute(
		key: string,
		compute: (signal: AbortSignal) => Promise<T>,
		options?: GetOrComputeOptions<T>,
	): Promise<T>;

	/** Like getOrCompute, also reporting how the value was obtained */
	lookup(
		key: string,
		compute: (signal: AbortSignal) => Promise<T>,
		options?: GetOrComputeOptions<T>,
	): Promise<CacheLookup<T>>;

	/** Live entry without computing, or null */
	peek(key: string): CacheEntry<T> | null;

	invalidate(key: string): boolean;

	readonly size: number;
}

export interface CacheStats {
	size: number;
	inflight: number;
	hits: number;
	misses: number;
	joins: number;
	evictions: number;
	hitRate: number;
}

export interface CacheManager {
	region<T>(name: string, options?: CacheRegionOptions): CacheRegion<T>;

	/** Remove a key from whichever region holds it */
	invalidate(key: string): boolean;

	/**
	 * Remove every entry registered against the document; returns the count.
	 * In-flight computations with document dependencies are marked stale.
	 */
	invalidateDocument(documentId: string): number;

	handleDocumentEvent(event: DocumentEvent): number;

	/** Drop expired entries now; returns the count */
	sweep(): number;

	/** Begin the periodic sweep (idempotent) */
	start(): void;

	stop(): void;

	/** Drop all entries; in-flight computations finish but are not committed */
	flush(): void;

	getStats(): CacheStats;
}

export interface CacheManagerOptions {
	/** Default entry TTL in ms (default: 5 minutes) */
	defaultTtlMs?: number;
	/** Default per-region entry bound (default: 10000) */
	maxEntries?: number;
	/** Background sweep period in ms (default: 60000) */
	sweepIntervalMs?: number;
	/** Clock in ms (default: Date.now) */
	now?: () => number;
	logger?: Logger;
	metrics?: RetrievalMetrics;
}

// ============================================================================
// Helpers
// ============================================================================

function abortReason(signal: AbortSignal): unknown {
	return signal.reason ?? new DOMException("The operation was aborted", "AbortError");
}

/** Settle with `promise` unless `signal` aborts first */
function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
	if (!signal) return promise;
	if (signal.aborted) return Promise.reject(abortReason(signal));

	return new Promise<T>((resolve, reject) => {
		const onAbort = () => reject(abortReason(signal));
		signal.addEventListener("abort", onAbort, { once: true });
		void promise.then(
			(value) => {
				signal.removeEventListener("abort", onAbort);
				resolve(value);
			},
			(error: unknown) => {
				signal.removeEventListener("abort", onAbort);
				reject(error);
			},
		);
	});
}

interface Flight<T> {
	promise: Promise<T>;
	/** Set when invalidated; a stale flight is neither joined nor committed */
	stale: boolean;
	controller: AbortController;
	/** Callers currently awaiting the promise */
	waiters: number;
}

/** Non-generic view of a region used by the manager for cross-region work */
interface RegionControl {
	has(key: string): boolean;
	remove(key: string): boolean;
	removeExpired(now: number): number;
	clear(): void;
	size(): number;
	inflight(): number;
}

// ============================================================================
// Implementation
// ============================================================================

export function createCacheManager(options: CacheManagerOptions = {}): CacheManager {
	const {
		defaultTtlMs = 5 * 60 * 1000,
		maxEntries: defaultMaxEntries = 10_000,
		sweepIntervalMs = 60_000,
		now = Date.now,
		logger = nullLogger,
		metrics,
	} = options;

	const log = logger.child({ component: "cache" });
	const regions = new Map<string, RegionControl>();
	/** document id → keys registered against it, across regions */
	const documentKeys = new Map<string, Set<string>>();
	/** In-flight computations whose value depends on documents */
	const documentFlights = new Set<{ stale: boolean }>();

	let hits = 0;
	let misses = 0;
	let joins = 0;
	let evictions = 0;
	let sweepTimer: ReturnType<typeof setInterval> | null = null;

	function totalSize(): number {
		let size = 0;
		for (const region of regions.values()) size += region.size();
		return size;
	}

	function recordEvictions(count: number): void {
		if (count === 0) return;
		evictions += count;
		metrics?.cacheEvictions.add(count);
		metrics?.cacheEntries.set(totalSize());
	}

	function registerDocuments(key: string, documentIds: readonly string[]): void {
		for (const documentId of documentIds) {
			let keys = documentKeys.get(documentId);
			if (!keys) {
				keys = new Set();
				documentKeys.set(documentId, keys);
			}
			keys.add(key);
		}
	}

	function unregisterDocuments(key: string, documentIds: readonly string[]): void {
		for (const documentId of documentIds) {
			const keys = documentKeys.get(documentId);
			if (!keys) continue;
			keys.delete(key);
			if (keys.size === 0) documentKeys.delete(documentId);
		}
	}

	function createRegion<T>(name: string, regionOptions: CacheRegionOptions): CacheRegion<T> {
		const ttlDefault = regionOptions.ttlMs ?? defaultTtlMs;
		const maxEntries = regionOptions.maxEntries ?? defaultMaxEntries;

		const entries = new Map<string, CacheEntry<T>>();
		const pending = new Map<string, Flight<T>>();

		function isExpired(entry: CacheEntry<T>, at: number): boolean {
			return at >= entry.createdAt + entry.ttlMs;
		}

		function remove(key: string): boolean {
			const entry = entries.get(key);
			const flight = pending.get(key);
			if (flight) flight.stale = true;
			if (!entry) return false;
			entries.delete(key);
			unregisterDocuments(key, entry.documentIds);
			return true;
		}

		function liveEntry(key: string): CacheEntry<T> | null {
			const entry = entries.get(key);
			if (!entry) return null;
			if (isExpired(entry, now())) {
				remove(key);
				recordEvictions(1);
				return null;
			}
			return entry;
		}

		function commit(key: string, value: T, ttlMs: number, documentIds: readonly string[]): void {
			// Insert-if-absent
			if (liveEntry(key)) return;

			const entry: CacheEntry<T> = Object.freeze({
				key,
				value,
				createdAt: now(),
				ttlMs,
				documentIds: Object.freeze([...documentIds]),
			});
			entries.set(key, entry);
			registerDocuments(key, entry.documentIds);

			// Map order is insertion order, and entries are never re-inserted in place
			let evicted = 0;
			while (entries.size > maxEntries) {
				const oldest = entries.keys().next();
				if (oldest.done) break;
				remove(oldest.value);
				evicted++;
			}
			recordEvictions(evicted);
			metrics?.cacheEntries.set(totalSize());
		}

		function startComputation(
			key: string,
			compute: (signal: AbortSignal) => Promise<T>,
			opts: GetOrComputeOptions<T>,
		): Flight<T> {
			const controller = new AbortController();
			const flight: Flight<T> = {
				promise: Promise.resolve().then(() => compute(controller.signal)),
				stale: false,
				controller,
				waiters: 0,
			};
			pending.set(key, flight);
			if (opts.documentIds !== undefined) documentFlights.add(flight);

			const settle = () => {
				if (pending.get(key) === flight) pending.delete(key);
				documentFlights.delete(flight);
			};

			void flight.promise.then(
				(value) => {
					settle();
					if (flight.stale) {
						log.debug("Discarding result invalidated during computation", { region: name, key });
						return;
					}
					if (opts.shouldCommit && !opts.shouldCommit(value)) return;
					try {
						const documentIds =
							typeof opts.documentIds === "function" ? opts.documentIds(value) : (opts.documentIds ?? []);
						commit(key, value, opts.ttlMs ?? ttlDefault, documentIds);
					} catch (error) {
						log.warn("Failed to commit cache entry", {
							region: name,
							key,
							error: error instanceof Error ? error.message : String(error),
						});
					}
				},
				(error: unknown) => {
					settle();
					log.debug("Computation failed, nothing cached", {
						region: name,
						key,
						error: error instanceof Error ? error.message : String(error),
					});
				},
			);

			return flight;
		}

		async function awaitFlight(flight: Flight<T>, signal?: AbortSignal): Promise<T> {
			flight.waiters++;
			try {
				return await raceAbort(flight.promise, signal);
			} finally {
				flight.waiters--;
				// Nobody is left to receive the value: stop the work, later callers start over
				if (flight.waiters === 0 && signal?.aborted) {
					flight.stale = true;
					flight.controller.abort(abortReason(signal));
				}
			}
		}

		const region: CacheRegion<T> = {
			name,

			async getOrCompute(key, compute, opts = {}) {
				const result = await region.lookup(key, compute, opts);
				return result.value;
			},

			async lookup(key, compute, opts = {}) {
				if (opts.signal?.aborted) throw abortReason(opts.signal);

				const entry = liveEntry(key);
				if (entry) {
					hits++;
					metrics?.cacheHits.inc();
					return { value: entry.value, status: "hit" };
				}

				const inflight = pending.get(key);
				if (inflight && !inflight.stale) {
					joins++;
					metrics?.cacheJoins.inc();
					return { value: await awaitFlight(inflight, opts.signal), status: "joined" };
				}

				misses++;
				metrics?.cacheMisses.inc();
				const flight = startComputation(key, compute, opts);
				return { value: await awaitFlight(flight, opts.signal), status: "miss" };
			},

			peek(key) {
				return liveEntry(key);
			},

			invalidate(key) {
				const removed = remove(key);
				recordEvictions(removed ? 1 : 0);
				return removed;
			},

			get size() {
				return entries.size;
			},
		};

		regions.set(name, {
			has: (key) => entries.has(key) || pending.has(key),
			remove,
			removeExpired(at) {
				let removed = 0;
				for (const [key, entry] of entries) {
					if (isExpired(entry, at)) {
						remove(key);
						removed++;
					}
				}
				return removed;
			},
			clear() {
				for (const flight of pending.values()) flight.stale = true;
				for (const key of [...entries.keys()]) remove(key);
			},
			size: () => entries.size,
			inflight: () => pending.size,
		});

		return region;
	}

	const manager: CacheManager = {
		region<T>(name: string, regionOptions: CacheRegionOptions = {}): CacheRegion<T> {
			if (regions.has(name)) {
				throw new Error(`Cache region "${name}" already exists`);
			}
			return createRegion<T>(name, regionOptions);
		},

		invalidate(key) {
			for (const region of regions.values()) {
				if (region.has(key)) {
					const removed = region.remove(key);
					recordEvictions(removed ? 1 : 0);
					return removed;
				}
			}
			return false;
		},

		invalidateDocument(documentId) {
			for (const flight of documentFlights) flight.stale = true;

			const keys = documentKeys.get(documentId);
			if (!keys) return 0;

			let removed = 0;
			for (const key of [...keys]) {
				for (const region of regions.values()) {
					if (region.remove(key)) removed++;
				}
			}
			documentKeys.delete(documentId);
			recordEvictions(removed);
			log.debug("Invalidated document entries", { documentId, removed });
			return removed;
		},

		handleDocumentEvent(event) {
			return manager.invalidateDocument(event.documentId);
		},

		sweep() {
			const at = now();
			let removed = 0;
			for (const region of regions.values()) removed += region.removeExpired(at);
			recordEvictions(removed);
			if (removed > 0) log.debug("Swept expired entries", { removed });
			return removed;
		},

		start() {
			if (sweepTimer) return;
			sweepTimer = setInterval(() => manager.sweep(), sweepIntervalMs);
			sweepTimer.unref();
		},

		stop() {
			if (!sweepTimer) return;
			clearInterval(sweepTimer);
			sweepTimer = null;
		},

		flush() {
			const size = totalSize();
			for (const region of regions.values()) region.clear();
			documentKeys.clear();
			recordEvictions(size);
		},

		getStats() {
			let inflight = 0;
			for (const region of regions.values()) inflight += region.inflight();
			const lookups = hits + misses + joins;
			return {
				size: totalSize(),
				inflight,
				hits,
				misses,
				joins,
				evictions,
				hitRate: lookups > 0 ? hits / lookups : 0,
			};
		},
	};

	return manager;
}
