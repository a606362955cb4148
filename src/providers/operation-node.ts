import * as k from "kysely";

import {
	type CteDefinition,
	type LineageAstNode,
	type TableReference,
	cteDefinition,
	queryBody,
	singleNode,
	tableReference,
	writeStatement,
} from "../ast.ts";

function isOperationNode(value: unknown): value is k.OperationNode {
	return (
		value !== null && typeof value === "object" && "kind" in value && typeof value.kind === "string"
	);
}

function extractTableName(table: k.TableNode): string {
	return schemableName(table.table);
}

function schemableName(identifier: k.SchemableIdentifierNode): string {
	const name = identifier.identifier.name;
	return identifier.schema ? `${identifier.schema.name}.${name}` : name;
}

function tableOf(node: k.TableNode): TableReference {
	return tableReference(extractTableName(node));
}

function convertWith(node: k.WithNode | undefined): CteDefinition[] {
	if (!node) {
		return [];
	}
	return node.expressions.map((cte) =>
		cteDefinition(extractTableName(cte.name.table), singleNode(convertNode(cte.expression))),
	);
}

/**
 * Converts every operation node found among the given properties of `node`,
 * in property order.
 */
function convertProperties(node: k.OperationNode, skip: ReadonlySet<string>): LineageAstNode[] {
	const converted: LineageAstNode[] = [];

	for (const [key, value] of Object.entries(node)) {
		if (skip.has(key)) {
			continue;
		}
		if (Array.isArray(value)) {
			for (const item of value) {
				if (isOperationNode(item)) {
					converted.push(...convertNode(item));
				}
			}
		} else if (isOperationNode(value)) {
			converted.push(...convertNode(value));
		}
	}

	return converted;
}

const NO_SKIP: ReadonlySet<string> = new Set();
const SKIP_WITH: ReadonlySet<string> = new Set(["with"]);
const SKIP_INSERT: ReadonlySet<string> = new Set(["with", "into"]);
const SKIP_CREATE_TABLE: ReadonlySet<string> = new Set(["table"]);
const SKIP_CREATE_VIEW: ReadonlySet<string> = new Set(["name"]);

/**
 * Converts one operation node.  Wrapper nodes collapse into the nodes found
 * beneath them, so this returns zero or more lineage nodes.
 */
function convertNode(node: k.OperationNode): LineageAstNode[] {
	if (k.TableNode.is(node)) {
		return [tableOf(node)];
	}

	// A column reference names its table only as a qualifier.
	if (k.ReferenceNode.is(node)) {
		return [];
	}

	if (k.SelectQueryNode.is(node)) {
		return [queryBody(convertWith(node.with), convertProperties(node, SKIP_WITH))];
	}

	if (k.InsertQueryNode.is(node)) {
		return [
			writeStatement(
				"insert",
				node.into ? tableOf(node.into) : undefined,
				convertWith(node.with),
				convertProperties(node, SKIP_INSERT),
			),
		];
	}

	if (k.CreateTableNode.is(node)) {
		return [
			writeStatement(
				"create_table",
				tableOf(node.table),
				[],
				convertProperties(node, SKIP_CREATE_TABLE),
			),
		];
	}

	if (k.CreateViewNode.is(node)) {
		return [
			writeStatement(
				"create_view",
				tableReference(schemableName(node.name)),
				[],
				convertProperties(node, SKIP_CREATE_VIEW),
			),
		];
	}

	return convertProperties(node, NO_SKIP);
}

/**
 * Converts a Kysely operation node into the lineage AST.
 *
 * @example
 * ```ts
 * const ast = fromOperationNode(
 *   db.insertInto("report").expression(db.selectFrom("orders").selectAll()).toOperationNode(),
 * );
 * ```
 */
export function fromOperationNode(node: k.OperationNode): LineageAstNode {
	return singleNode(convertNode(node));
}
