import { assertNever } from "./helpers/utils.ts";

/**
 * A table read or written by the statement.  The name is kept exactly as
 * written, including any schema qualification.
 */
export interface TableReference {
	readonly kind: "TableReference";
	readonly name: string;
}

/**
 * One entry of a `WITH` clause.
 */
export interface CteDefinition {
	readonly kind: "CteDefinition";
	readonly alias: string;
	readonly body: LineageAstNode;
}

export type WriteStatementType = "insert" | "create_table" | "create_view";

/**
 * An `INSERT INTO ... SELECT`, `CREATE TABLE ... AS SELECT` or
 * `CREATE VIEW ... AS SELECT`.
 */
export interface WriteStatement {
	readonly kind: "WriteStatement";
	readonly statement: WriteStatementType;
	readonly target: TableReference | undefined;
	readonly ctes: readonly CteDefinition[];
	readonly children: readonly LineageAstNode[];
}

/**
 * A `SELECT`.  Set operations (`UNION` and friends) appear as child query
 * bodies of the first `SELECT`.
 */
export interface QueryBody {
	readonly kind: "QueryBody";
	readonly ctes: readonly CteDefinition[];
	readonly children: readonly LineageAstNode[];
}

export interface OtherNode {
	readonly kind: "Other";
	readonly children: readonly LineageAstNode[];
}

export type LineageAstNode = TableReference | CteDefinition | WriteStatement | QueryBody | OtherNode;

export type LineageAstKind = LineageAstNode["kind"];

export type LineageAstNodeOfKind<K extends LineageAstKind> = Extract<LineageAstNode, { kind: K }>;

export function tableReference(name: string): TableReference {
	return { kind: "TableReference", name };
}

export function cteDefinition(alias: string, body: LineageAstNode): CteDefinition {
	return { kind: "CteDefinition", alias, body };
}

export function writeStatement(
	statement: WriteStatementType,
	target: TableReference | undefined,
	ctes: readonly CteDefinition[],
	children: readonly LineageAstNode[],
): WriteStatement {
	return { kind: "WriteStatement", statement, target, ctes, children };
}

export function queryBody(
	ctes: readonly CteDefinition[],
	children: readonly LineageAstNode[],
): QueryBody {
	return { kind: "QueryBody", ctes, children };
}

export function otherNode(children: readonly LineageAstNode[]): OtherNode {
	return { kind: "Other", children };
}

/**
 * Wraps a list of nodes into one, unless it already holds exactly one.
 */
export function singleNode(nodes: readonly LineageAstNode[]): LineageAstNode {
	return nodes.length === 1 && nodes[0] ? nodes[0] : otherNode(nodes);
}

/**
 * Direct children of a node.  A write statement lists its target first, then
 * its CTE definitions, then the rest.
 */
export function childrenOf(node: LineageAstNode): readonly LineageAstNode[] {
	switch (node.kind) {
		case "TableReference":
			return [];
		case "CteDefinition":
			return [node.body];
		case "WriteStatement":
			return node.target ? [node.target, ...node.ctes, ...node.children] : [...node.ctes, ...node.children];
		case "QueryBody":
			return [...node.ctes, ...node.children];
		case "Other":
			return node.children;
		default:
			return assertNever(node);
	}
}

function isKind<K extends LineageAstKind>(
	node: LineageAstNode,
	kind: K,
): node is LineageAstNodeOfKind<K> {
	return node.kind === kind;
}

export interface FindOptions {
	/**
	 * Return `false` to leave a node's subtree out of the search.  The node
	 * itself is still matched.
	 */
	readonly descend?: (node: LineageAstNode) => boolean;
}

/**
 * Every node of the given kind in the tree, root included, in breadth-first
 * order.
 */
export function findAll<K extends LineageAstKind>(
	root: LineageAstNode,
	kind: K,
	options: FindOptions = {},
): LineageAstNodeOfKind<K>[] {
	const found: LineageAstNodeOfKind<K>[] = [];
	const queue: LineageAstNode[] = [root];

	for (let i = 0; i < queue.length; i++) {
		const node = queue[i];
		if (!node) {
			continue;
		}
		if (isKind(node, kind)) {
			found.push(node);
		}
		if (!options.descend || options.descend(node)) {
			queue.push(...childrenOf(node));
		}
	}

	return found;
}

/**
 * The first node of the given kind in breadth-first order.
 */
export function find<K extends LineageAstKind>(
	root: LineageAstNode,
	kind: K,
	options: FindOptions = {},
): LineageAstNodeOfKind<K> | undefined {
	const queue: LineageAstNode[] = [root];

	for (let i = 0; i < queue.length; i++) {
		const node = queue[i];
		if (!node) {
			continue;
		}
		if (isKind(node, kind)) {
			return node;
		}
		if (!options.descend || options.descend(node)) {
			queue.push(...childrenOf(node));
		}
	}

	return undefined;
}
