/**
 * Bounded breadth-first neighbor walk shared by the graph store implementations.
 */

import type { NeighborEdge, NeighborQuery, RelationEdge } from "./types";

export const DEFAULT_MAX_DEPTH = 1;
export const DEFAULT_MAX_FAN_OUT = 10;

/**
 * Walk outward from `start` using `incidentEdges` to list the edges touching an
 * entity. Edges are followed in both directions.
 *
 * Each entity is admitted at most once (visited set keyed by id), and at most
 * `maxFanOut` new entities are admitted per hop, strongest edges first. The
 * result therefore holds at most `maxDepth * maxFanOut` edges.
 */
export function walkNeighbors(
	start: string,
	query: NeighborQuery | undefined,
	incidentEdges: (entityId: string) => RelationEdge[],
): NeighborEdge[] {
	const maxDepth = Math.max(0, query?.maxDepth ?? DEFAULT_MAX_DEPTH);
	const maxFanOut = Math.max(0, query?.maxFanOut ?? DEFAULT_MAX_FAN_OUT);

	const visited = new Set<string>([start]);
	const result: NeighborEdge[] = [];
	let frontier = [start];

	for (let depth = 1; depth <= maxDepth && frontier.length > 0; depth++) {
		const candidates: RelationEdge[] = [];
		for (const entityId of frontier) {
			for (const edge of incidentEdges(entityId)) {
				const oriented = orientFrom(edge, entityId);
				if (!visited.has(oriented.to)) {
					candidates.push(oriented);
				}
			}
		}

		candidates.sort(compareEdges);

		const next: string[] = [];
		for (const edge of candidates) {
			if (next.length >= maxFanOut) break;
			if (visited.has(edge.to)) continue;
			visited.add(edge.to);
			next.push(edge.to);
			result.push({ ...edge, depth });
		}

		frontier = next;
	}

	return result;
}

function orientFrom(edge: RelationEdge, entityId: string): RelationEdge {
	if (edge.from === entityId) return edge;
	return { from: entityId, to: edge.from, relation: edge.relation, weight: edge.weight };
}

/** Strongest first; ties by target then source id */
export function compareEdges(a: RelationEdge, b: RelationEdge): number {
	if (b.weight !== a.weight) return b.weight - a.weight;
	if (a.to !== b.to) return a.to < b.to ? -1 : 1;
	return a.from < b.from ? -1 : a.from > b.from ? 1 : 0;
}
