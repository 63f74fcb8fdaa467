/**
 * Metadata filter predicate shared by the reference indexes.
 *
 * - scalar: exact match, or membership when the stored value is an array
 * - array: any-of
 * - `{ gte, lte }`: inclusive numeric range
 *
 * `document_id` and `page` address the chunk's own fields; every other key
 * reads chunk metadata. All filters must match.
 */

import type { ChunkRecord, FilterValue, MetadataValue, RangeFilter, SearchFilters } from "../types";

export function isRangeFilter(value: FilterValue): value is RangeFilter {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fieldValue(chunk: ChunkRecord, key: string): MetadataValue | undefined {
	if (key === "document_id") return chunk.documentId;
	if (key === "page") return chunk.page ?? null;
	return chunk.metadata[key];
}

function matchesScalar(stored: MetadataValue, expected: string | number | boolean): boolean {
	if (Array.isArray(stored)) {
		return stored.some((item) => item === expected);
	}
	return stored === expected;
}

function matchesOne(stored: MetadataValue | undefined, expected: FilterValue): boolean {
	if (stored === undefined || stored === null) return false;

	if (isRangeFilter(expected)) {
		if (typeof stored !== "number") return false;
		if (expected.gte !== undefined && stored < expected.gte) return false;
		if (expected.lte !== undefined && stored > expected.lte) return false;
		return true;
	}

	if (Array.isArray(expected)) {
		return expected.some((candidate) => matchesScalar(stored, candidate));
	}

	return matchesScalar(stored, expected);
}

export function matchesFilters(chunk: ChunkRecord, filters?: Readonly<SearchFilters>): boolean {
	if (!filters) return true;
	for (const [key, expected] of Object.entries(filters)) {
		if (!matchesOne(fieldValue(chunk, key), expected)) return false;
	}
	return true;
}

export function hasFilters(filters?: Readonly<SearchFilters>): boolean {
	return filters !== undefined && Object.keys(filters).length > 0;
}
