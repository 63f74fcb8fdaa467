import { describe, expect, test } from "vitest";
import { fuseResults, normalizeScores, type RankedList } from "../query/rrf-fusion";
import type { HitSource, SearchHit } from "../types";

function list(source: HitSource, entries: Array<[string, number]>): RankedList {
	return {
		source,
		hits: entries.map(([chunkId, rawScore]): SearchHit => ({ chunkId, rawScore, source })),
	};
}

describe("normalizeScores", () => {
	test("min-max scales into [0, 1]", () => {
		expect(normalizeScores(list("keyword", [["a", 12], ["b", 3], ["c", 1]]).hits)).toEqual([1, 2 / 11, 0]);
	});

	test("a single hit or an all-equal list normalizes to 1", () => {
		expect(normalizeScores(list("vector", [["a", 0.3]]).hits)).toEqual([1]);
		expect(normalizeScores(list("vector", [["a", 0.5], ["b", 0.5]]).hits)).toEqual([1, 1]);
		expect(normalizeScores([])).toEqual([]);
	});
});

describe("fuseResults", () => {
	const vector = list("vector", [
		["x", 0.9],
		["y", 0.85],
		["z", 0.2],
	]);
	const keyword = list("keyword", [
		["y", 12],
		["x", 3],
		["w", 1],
	]);

	test("chunks found by both lists rank above single-list chunks", () => {
		const fused = fuseResults([vector, keyword]);

		expect(fused.map((r) => r.chunkId)).toEqual(["y", "x", "z", "w"]);
		expect(fused.map((r) => r.rank)).toEqual([1, 2, 3, 4]);
	});

	test("equal reciprocal-rank sums fall back to the summed normalized score", () => {
		const [y, x] = fuseResults([vector, keyword]);

		expect(y.rrfScore).toBe(x.rrfScore);
		expect(y.normalizedScores.vector).toBeCloseTo(0.65 / 0.7, 12);
		expect(y.normalizedScores.keyword).toBe(1);
		expect(x.normalizedScores).toEqual({ vector: 1, keyword: 2 / 11 });
	});

	test("fused scores are scaled by the best reachable score", () => {
		const fused = fuseResults([vector, keyword]);
		const byId = new Map(fused.map((r) => [r.chunkId, r]));

		expect(byId.get("y")?.fusedScore).toBeCloseTo(123 / 124, 12);
		expect(byId.get("z")?.fusedScore).toBeCloseTo(61 / 126, 12);
		expect(byId.get("w")?.fusedScore).toBeCloseTo(61 / 126, 12);
		for (const result of fused) {
			expect(result.fusedScore).toBeGreaterThanOrEqual(0);
			expect(result.fusedScore).toBeLessThanOrEqual(1);
		}
	});

	test("a chunk in both lists scores strictly above its single-list score", () => {
		const both = fuseResults([vector, keyword]).find((r) => r.chunkId === "y");
		const vectorOnly = fuseResults([vector, list("keyword", [["q", 1]])]).find((r) => r.chunkId === "y");

		expect(both?.sources).toEqual(new Set(["vector", "keyword"]));
		expect(vectorOnly?.sources).toEqual(new Set(["vector"]));
		expect(both?.fusedScore ?? 0).toBeGreaterThan(vectorOnly?.fusedScore ?? 1);
	});

	test("ties on score prefer the vector source", () => {
		const fused = fuseResults([list("keyword", [["k", 5]]), list("vector", [["v", 0.5]])]);

		expect(fused.map((r) => r.chunkId)).toEqual(["v", "k"]);
		expect(fused[0].fusedScore).toBeCloseTo(0.5, 12);
	});

	test("chunk ids are distinct and duplicates keep their first rank", () => {
		const fused = fuseResults([
			list("vector", [
				["a", 0.9],
				["b", 0.8],
				["a", 0.1],
			]),
		]);

		expect(fused.map((r) => r.chunkId)).toEqual(["a", "b"]);
		expect(fused[0].sourceRanks).toEqual({ vector: 1 });
		expect(fused[0].fusedScore).toBe(1);
	});

	test("graph hits count at half weight", () => {
		const fused = fuseResults([list("vector", [["a", 0.9]]), list("graph", [["g", 1]])]);

		expect(fused.map((r) => r.chunkId)).toEqual(["a", "g"]);
		expect(fused[1].rrfScore).toBeCloseTo(0.5 / 61, 12);
	});

	test("empty lists do not dilute the scale", () => {
		const fused = fuseResults([list("vector", []), list("keyword", [["k", 2]])]);

		expect(fused).toHaveLength(1);
		expect(fused[0].fusedScore).toBe(1);
		expect(fuseResults([])).toEqual([]);
	});
});
