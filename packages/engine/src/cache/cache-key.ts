import { createHash } from "node:crypto";

/**
 * JSON with object keys sorted at every level, so semantically equal inputs
 * (e.g. filters built in a different order) hash identically.
 */
export function stableStringify(value: unknown): string {
	if (value === undefined) return "null";
	if (value === null || typeof value !== "object") return JSON.stringify(value);
	if (Array.isArray(value)) {
		return `[${value.map((item) => stableStringify(item)).join(",")}]`;
	}
	if (value instanceof Set) {
		return stableStringify([...value].sort());
	}

	const entries = Object.entries(value)
		.filter(([, v]) => v !== undefined)
		.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
	return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`).join(",")}}`;
}

/**
 * `namespace:version:sha256(parts)`. The version tag is the embedding model for
 * embedding entries and the index snapshot for result entries, so bumping either
 * orphans old entries instead of serving them.
 */
export function deriveCacheKey(namespace: string, version: string, ...parts: unknown[]): string {
	const digest = createHash("sha256").update(stableStringify(parts)).digest("hex");
	return `${namespace}:${version}:${digest}`;
}
