import { type LineageAstNode, findAll } from "../ast.ts";
import { type LineageGraphBuilder } from "../graph.ts";
import { type CteRegistry } from "./cte-registry.ts";

/**
 * Adds an edge from every table referenced in `subtree` to `owner`, the node
 * the subtree belongs to.  References to `owner` itself add nothing.
 *
 * Registered CTE definitions inside the subtree are skipped: their tables feed
 * the CTE's own node, which is traced separately.
 */
export function traceDependencies(
	builder: LineageGraphBuilder,
	subtree: LineageAstNode,
	owner: string,
	registry: CteRegistry,
): void {
	const references = findAll(subtree, "TableReference", {
		descend: (node) =>
			node === subtree ||
			node.kind !== "CteDefinition" ||
			registry.get(node.alias) !== node.body,
	});

	for (const reference of references) {
		if (reference.name !== owner) {
			builder.addEdge(reference.name, owner);
		}
	}
}
