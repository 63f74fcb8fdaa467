/**
 * Engine Configuration
 *
 * Zod schema with defaults for every section, plus environment overrides.
 */

import { z } from "zod";
import { ValidationError } from "./errors";

// ==========================================
// ZOD SCHEMAS
// ==========================================

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const EngineConfigSchema = z.object({
	search: z
		.object({
			defaultTopK: positiveInt.default(10),
			maxTopK: positiveInt.default(100),
			/** Upper bound on candidates fetched per searcher */
			maxCandidates: positiveInt.default(200),
			maxQueryLength: positiveInt.default(1000),
			/** Filter keys accepted by the planner */
			filterableFields: z
				.array(z.string().min(1))
				.default([
					"document_id",
					"uploaded_by",
					"source",
					"author",
					"title",
					"content_type",
					"language",
					"tags",
					"page",
					"created_at",
				]),
		})
		.default({}),

	timeouts: z
		.object({
			/** Shared deadline for the concurrent vector + keyword stage */
			queryMs: positiveInt.default(2000),
			graphMs: positiveInt.default(500),
			rerankMs: positiveInt.default(1000),
		})
		.default({}),

	retry: z
		.object({
			attempts: positiveInt.default(3),
			baseDelayMs: nonNegativeInt.default(100),
			maxDelayMs: nonNegativeInt.default(1000),
		})
		.default({}),

	bm25: z
		.object({
			k1: z.number().nonnegative().default(1.2),
			b: z.number().min(0).max(1).default(0.75),
		})
		.default({}),

	fusion: z
		.object({
			kappa: z.number().positive().default(60),
			weights: z
				.object({
					vector: z.number().positive().default(1.0),
					keyword: z.number().positive().default(1.0),
					graph: z.number().positive().default(0.5),
				})
				.default({}),
		})
		.default({}),

	graph: z
		.object({
			enabled: z.boolean().default(false),
			seedCount: positiveInt.default(10),
			maxDepth: positiveInt.default(2),
			maxFanOut: positiveInt.default(10),
			baseWeight: z.number().positive().default(1.0),
			maxChunksPerEntity: positiveInt.default(5),
		})
		.default({}),

	rerank: z
		.object({
			enabled: z.boolean().default(true),
			topM: positiveInt.default(20),
		})
		.default({}),

	cache: z
		.object({
			enabled: z.boolean().default(true),
			embeddingTtlMs: positiveInt.default(30 * 60 * 1000),
			resultTtlMs: positiveInt.default(5 * 60 * 1000),
			maxEntries: positiveInt.default(10_000),
			sweepIntervalMs: positiveInt.default(60_000),
		})
		.default({}),

	response: z
		.object({
			snippetLength: positiveInt.default(500),
			/** Characters kept before the first highlight when trimming a snippet */
			snippetLeadChars: nonNegativeInt.default(80),
		})
		.default({}),

	versions: z
		.object({
			/** Index snapshot version; tags query-result cache keys */
			index: z.string().min(1).default("v1"),
			/** Embedding model; tags embedding cache keys */
			embeddingModel: z.string().min(1).default("voyage-3"),
		})
		.default({}),

	voyage: z
		.object({
			/** Without a key the engine falls back to local embedder and reranker */
			apiKey: z.string().min(1).optional(),
			rerankModel: z.string().min(1).default("rerank-2.5"),
			embeddingDimension: positiveInt.default(1024),
		})
		.default({}),

	logLevel: LogLevelSchema.default("info"),
});

// ==========================================
// TYPES
// ==========================================

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigSchema.parse({});

// ==========================================
// LOADING
// ==========================================

/**
 * Parse a config object, throwing ValidationError with one line per issue.
 */
export function parseConfig(input: unknown): EngineConfig {
	const result = EngineConfigSchema.safeParse(input);
	if (!result.success) {
		const issues = result.error.issues.map(
			(issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
		);
		throw new ValidationError(`Invalid engine configuration: ${issues.join("; ")}`, issues);
	}
	return result.data;
}

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
	const raw = env[name];
	if (raw === undefined || raw.trim() === "") return undefined;
	const value = Number(raw);
	if (!Number.isFinite(value)) {
		throw new ValidationError(`${name} must be a number, got "${raw}"`);
	}
	return value;
}

function readBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
	const raw = env[name]?.trim().toLowerCase();
	if (raw === undefined || raw === "") return undefined;
	if (["1", "true", "yes", "on"].includes(raw)) return true;
	if (["0", "false", "no", "off"].includes(raw)) return false;
	throw new ValidationError(`${name} must be a boolean, got "${env[name]}"`);
}

function readLogLevel(env: NodeJS.ProcessEnv): z.infer<typeof LogLevelSchema> | undefined {
	const raw = env.LOG_LEVEL?.trim().toLowerCase();
	if (!raw) return undefined;
	const parsed = LogLevelSchema.safeParse(raw);
	if (!parsed.success) {
		throw new ValidationError(`LOG_LEVEL must be one of debug, info, warn, error, got "${env.LOG_LEVEL}"`);
	}
	return parsed.data;
}

/**
 * Build configuration from explicit overrides layered over environment variables.
 *
 * Recognized variables: RETRIEVAL_MAX_TOP_K, RETRIEVAL_QUERY_TIMEOUT_MS,
 * RETRIEVAL_CACHE_TTL_SECONDS, RETRIEVAL_ENABLE_GRAPH, RETRIEVAL_ENABLE_RERANK,
 * RETRIEVAL_INDEX_VERSION, EMBEDDING_MODEL, VOYAGE_AI_API_KEY, LOG_LEVEL.
 */
export function loadConfig(
	overrides: EngineConfigInput = {},
	env: NodeJS.ProcessEnv = process.env,
): EngineConfig {
	const cacheTtlSeconds = readNumber(env, "RETRIEVAL_CACHE_TTL_SECONDS");

	const fromEnv: EngineConfigInput = {
		search: { maxTopK: readNumber(env, "RETRIEVAL_MAX_TOP_K") },
		timeouts: { queryMs: readNumber(env, "RETRIEVAL_QUERY_TIMEOUT_MS") },
		cache: {
			resultTtlMs: cacheTtlSeconds !== undefined ? cacheTtlSeconds * 1000 : undefined,
		},
		graph: { enabled: readBoolean(env, "RETRIEVAL_ENABLE_GRAPH") },
		rerank: { enabled: readBoolean(env, "RETRIEVAL_ENABLE_RERANK") },
		versions: {
			index: env.RETRIEVAL_INDEX_VERSION?.trim() || undefined,
			embeddingModel: env.EMBEDDING_MODEL?.trim() || undefined,
		},
		voyage: { apiKey: env.VOYAGE_AI_API_KEY?.trim() || undefined },
		logLevel: readLogLevel(env),
	};

	// Unset values stay undefined so schema defaults apply
	return parseConfig({
		search: { ...fromEnv.search, ...overrides.search },
		timeouts: { ...fromEnv.timeouts, ...overrides.timeouts },
		retry: overrides.retry,
		bm25: overrides.bm25,
		fusion: overrides.fusion,
		graph: { ...fromEnv.graph, ...overrides.graph },
		rerank: { ...fromEnv.rerank, ...overrides.rerank },
		cache: { ...fromEnv.cache, ...overrides.cache },
		response: overrides.response,
		versions: { ...fromEnv.versions, ...overrides.versions },
		voyage: { ...fromEnv.voyage, ...overrides.voyage },
		logLevel: overrides.logLevel ?? fromEnv.logLevel,
	});
}
