/**
 * Query Planner
 *
 * Validates a search request, classifies it, sizes candidate retrieval and
 * emits a frozen SearchPlan. Pure: no I/O, no cache access.
 */

import { z } from "zod";
import type { EngineConfig } from "../config";
import { ValidationError } from "../errors";
import { tokenize } from "../text/tokenizer";
import type { SearchFilters, SearchPlan, SearchRequest, SearchType } from "../types";

// ============================================================================
// Request Schema
// ============================================================================

const RangeFilterSchema = z
	.object({
		gte: z.number().finite().optional(),
		lte: z.number().finite().optional(),
	})
	.strict()
	.refine((range) => range.gte !== undefined || range.lte !== undefined, {
		message: "Range filter needs gte or lte",
	})
	.refine((range) => range.gte === undefined || range.lte === undefined || range.gte <= range.lte, {
		message: "Range filter gte must not exceed lte",
	});

export const FilterValueSchema = z.union([
	z.string(),
	z.number().finite(),
	z.boolean(),
	z.array(z.union([z.string(), z.number().finite()])).min(1),
	RangeFilterSchema,
]);

export const SearchTypeSchema = z.enum(["vector", "keyword", "hybrid"]);

export const SearchRequestSchema = z
	.object({
		query: z.string(),
		topK: z.number().int().positive().optional(),
		filters: z.record(z.string(), FilterValueSchema).optional(),
		searchType: SearchTypeSchema.optional(),
		includeMetadata: z.boolean().optional(),
		rerank: z.boolean().optional(),
	})
	.strict();

// ============================================================================
// Classification
// ============================================================================

const QUOTED_PHRASE = /"[^"]+"/;
const IDENTIFIER_SEPARATED = /^[\p{L}\p{N}]+(?:[-_.:/#][\p{L}\p{N}]+)+$/u;
const LETTERS_AND_DIGITS = /^(?=.*\p{L})(?=.*\p{N})[\p{L}\p{N}]+$/u;
const CAMEL_CASE = /^\p{Ll}+(?:\p{Lu}\p{Ll}*)+$/u;

/**
 * Single token that reads as a code, id or symbol name rather than prose:
 * `INV-2024-001`, `user_id`, `v2`, `getUserById`.
 */
export function isIdentifierLike(query: string): boolean {
	const trimmed = query.trim();
	if (trimmed.length === 0 || /\s/.test(trimmed)) return false;
	return IDENTIFIER_SEPARATED.test(trimmed) || LETTERS_AND_DIGITS.test(trimmed) || CAMEL_CASE.test(trimmed);
}

/**
 * Search type for a query without an explicit override.
 */
export function classifyQuery(query: string, hasFilters: boolean): SearchType {
	const contentTerms = tokenize(query);

	if (contentTerms.length === 0) return "vector";
	if (QUOTED_PHRASE.test(query) || isIdentifierLike(query)) return "keyword";
	if (hasFilters && contentTerms.length <= 2) return "keyword";
	return "hybrid";
}

// ============================================================================
// Adaptive Candidate Sizing
// ============================================================================

/**
 * Candidates requested from each searcher.
 *
 * - Short queries (1-2 words): fewer candidates
 * - Long queries (6+ words): more candidates for disambiguation
 * - Filtered queries: more candidates, since filters prune the pool
 */
export function computeCandidateLimit(
	query: string,
	topK: number,
	options: { rerankTopM: number; filtered: boolean; maxCandidates: number },
): number {
	const wordCount = query.split(/\s+/).filter((w) => w.length > 0).length;
	let limit = Math.max(topK, options.rerankTopM);

	if (wordCount <= 2) {
		limit = Math.round(limit * 0.75);
	} else if (wordCount >= 6) {
		limit = Math.round(limit * 1.5);
	}

	if (options.filtered) {
		limit = Math.round(limit * 1.25);
	}

	return Math.max(topK, Math.min(options.maxCandidates, limit));
}

// ============================================================================
// Planner
// ============================================================================

export interface QueryPlannerOptions {
	config: EngineConfig;
	/** Whether a graph store is attached (default: false) */
	graphAvailable?: boolean;
}

export interface QueryPlanner {
	/** @throws ValidationError */
	plan(request: SearchRequest): SearchPlan;
}

function formatIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`);
}

export function createQueryPlanner(options: QueryPlannerOptions): QueryPlanner {
	const { config, graphAvailable = false } = options;
	const allowedKeys = new Set(config.search.filterableFields);

	return {
		plan(request) {
			const parsed = SearchRequestSchema.safeParse(request);
			if (!parsed.success) {
				const issues = formatIssues(parsed.error);
				throw new ValidationError(`Invalid search request: ${issues.join("; ")}`, issues);
			}
			const input = parsed.data;

			const issues: string[] = [];
			const query = input.query.trim();
			if (query.length === 0) {
				issues.push("query: must not be empty");
			} else if (query.length > config.search.maxQueryLength) {
				issues.push(`query: must be at most ${config.search.maxQueryLength} characters`);
			}

			const topK = input.topK ?? config.search.defaultTopK;
			if (topK > config.search.maxTopK) {
				issues.push(`topK: must be at most ${config.search.maxTopK}`);
			}

			const filters: SearchFilters = {};
			for (const [key, value] of Object.entries(input.filters ?? {})) {
				if (!allowedKeys.has(key)) {
					issues.push(`filters.${key}: not a filterable field`);
					continue;
				}
				filters[key] = Array.isArray(value) ? [...value] : value;
			}

			if (issues.length > 0) {
				throw new ValidationError(`Invalid search request: ${issues.join("; ")}`, issues);
			}

			const filtered = Object.keys(filters).length > 0;
			const searchType = input.searchType ?? classifyQuery(query, filtered);
			const rerankEnabled = (input.rerank ?? true) && config.rerank.enabled;
			const graphExpandEnabled = graphAvailable && config.graph.enabled && searchType !== "keyword";

			return Object.freeze({
				query,
				searchType,
				topK,
				candidateLimit: computeCandidateLimit(query, topK, {
					rerankTopM: rerankEnabled ? config.rerank.topM : 0,
					filtered,
					maxCandidates: config.search.maxCandidates,
				}),
				filters: Object.freeze(filters),
				rerankEnabled,
				graphExpandEnabled,
				includeMetadata: input.includeMetadata ?? true,
			});
		},
	};
}
