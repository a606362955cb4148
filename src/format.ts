import { type LineageEdge, type LineageGraph } from "./graph.ts";
import { type CteRegistry } from "./helpers/cte-registry.ts";

export type NodeCategory = "raw" | "cte" | "target";

export interface LineageNode {
	readonly id: string;
	readonly label: string;
	readonly category: NodeCategory;
}

export interface Lineage {
	readonly nodes: readonly LineageNode[];
	readonly edges: readonly LineageEdge[];
}

export const EMPTY_LINEAGE: Lineage = Object.freeze({
	nodes: Object.freeze([]),
	edges: Object.freeze([]),
});

/**
 * Classifies a node by the shape of the graph around it.
 *
 * The target wins over a CTE of the same name, and a registered CTE is never
 * raw even when nothing feeds it.  A node that has inputs but is neither the
 * target nor a registered CTE falls back to `cte`.
 */
export function classifyNode(
	name: string,
	graph: LineageGraph,
	registry: CteRegistry,
	target: string | undefined,
): NodeCategory {
	if (name === target) {
		return "target";
	}
	if (registry.has(name)) {
		return "cte";
	}
	if (graph.inDegree(name) === 0) {
		return "raw";
	}
	return "cte";
}

function nodeLabel(name: string, category: NodeCategory, registry: CteRegistry): string {
	switch (category) {
		case "raw":
			return `RAW: ${name}`;
		case "cte":
			return registry.has(name) ? `CTE: ${name}` : name;
		case "target":
			return name;
	}
}

export function formatLineage(
	graph: LineageGraph,
	registry: CteRegistry,
	target: string | undefined,
): Lineage {
	const nodes = graph.nodes().map((name): LineageNode => {
		const category = classifyNode(name, graph, registry, target);
		return { id: name, label: nodeLabel(name, category, registry), category };
	});

	return { nodes, edges: graph.edges() };
}
