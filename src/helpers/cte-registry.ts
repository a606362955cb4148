import { type LineageAstNode, findAll } from "../ast.ts";

/**
 * CTE alias to the query body that defines it.
 */
export type CteRegistry = ReadonlyMap<string, LineageAstNode>;

/**
 * Registers every CTE attached to the statement or its queries.  CTEs declared
 * inside another CTE's body are not registered.  With duplicate aliases the
 * last definition wins.
 */
export function buildCteRegistry(root: LineageAstNode): CteRegistry {
	const registry = new Map<string, LineageAstNode>();
	const definitions = findAll(root, "CteDefinition", {
		descend: (node) => node.kind !== "CteDefinition",
	});

	for (const definition of definitions) {
		registry.set(definition.alias, definition.body);
	}

	return registry;
}
