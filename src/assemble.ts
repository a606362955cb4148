import { type LineageAstNode, find } from "./ast.ts";
import { type LineageGraph, LineageGraphBuilder } from "./graph.ts";
import { type CteRegistry, buildCteRegistry } from "./helpers/cte-registry.ts";
import { traceDependencies } from "./helpers/dependency-tracer.ts";
import { resolveTarget } from "./helpers/target-resolver.ts";

export interface AssembledLineage {
	readonly graph: LineageGraph;
	readonly registry: CteRegistry;
	readonly target: string | undefined;
}

/**
 * Builds the lineage graph of one parsed statement.
 *
 * Each CTE alias is added, then its body is traced into it.  The statement's
 * primary query (the first `SELECT` found breadth-first) is then traced into
 * the target, if there is one, and the target is added last, so its sources
 * precede it.  A target without a query still appears as a node.
 */
export function assembleLineage(root: LineageAstNode): AssembledLineage {
	const builder = new LineageGraphBuilder();
	const registry = buildCteRegistry(root);
	const target = resolveTarget(root);

	for (const [alias, body] of registry) {
		builder.addNode(alias);
		traceDependencies(builder, body, alias, registry);
	}

	if (target !== undefined) {
		const primaryQuery = find(root, "QueryBody");
		if (primaryQuery) {
			traceDependencies(builder, primaryQuery, target, registry);
		}
		builder.addNode(target);
	}

	return { graph: builder.build(), registry, target };
}
