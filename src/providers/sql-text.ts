import sqlParser from "node-sql-parser";

import {
	type CteDefinition,
	type LineageAstNode,
	type TableReference,
	cteDefinition,
	otherNode,
	queryBody,
	singleNode,
	tableReference,
	writeStatement,
} from "../ast.ts";
import {
	EmptySqlError,
	SqlParseError,
	StatementCountError,
	type TableLineageError,
} from "../helpers/errors.ts";
import { type Result, isRecord, qualifiedName } from "../helpers/utils.ts";
import { splitLeadingWith } from "./leading-with.ts";

export const SQL_DIALECTS = [
	"mysql",
	"mariadb",
	"postgresql",
	"sqlite",
	"bigquery",
	"snowflake",
	"transactsql",
] as const;

export type SqlDialect = (typeof SQL_DIALECTS)[number];

export const DEFAULT_DIALECT: SqlDialect = "mysql";

// Database names as node-sql-parser spells them.
const PARSER_DATABASES: Record<SqlDialect, string> = {
	mysql: "MySQL",
	mariadb: "MariaDB",
	postgresql: "PostgresQL",
	sqlite: "Sqlite",
	bigquery: "BigQuery",
	snowflake: "Snowflake",
	transactsql: "TransactSQL",
};

export function isSqlDialect(value: string): value is SqlDialect {
	return SQL_DIALECTS.some((dialect) => dialect === value);
}

export type ParseResult = Result<LineageAstNode, TableLineageError>;

const parser = new sqlParser.Parser();

/**
 * Parses one SQL statement into the lineage AST.  A `WITH` list written ahead
 * of an `INSERT` or `CREATE` belongs to that statement.
 */
export function parseSql(sql: string, dialect: SqlDialect = DEFAULT_DIALECT): ParseResult {
	if (sql.trim() === "") {
		return { ok: false, error: new EmptySqlError() };
	}

	const leading = splitLeadingWith(sql);
	if (!leading) {
		const parsed = astifyStatement(sql, dialect);
		return parsed.ok ? { ok: true, value: convertStatement(parsed.value) } : parsed;
	}

	const statement = astifyStatement(leading.statement, dialect);
	if (!statement.ok) {
		return statement;
	}
	// The parser only takes a WITH list in front of a SELECT.
	const withQuery = astifyStatement(`${leading.withClause} SELECT 1`, dialect);
	if (!withQuery.ok) {
		return withQuery;
	}

	return {
		ok: true,
		value: withCtes(convertWith(withQuery.value.with), convertStatement(statement.value)),
	};
}

function astifyStatement(
	sql: string,
	dialect: SqlDialect,
): Result<Record<string, unknown>, TableLineageError> {
	let parsed: unknown;
	try {
		parsed = parser.astify(sql, { database: PARSER_DATABASES[dialect] });
	} catch (error) {
		return { ok: false, error: new SqlParseError(error) };
	}

	const statements = Array.isArray(parsed) ? parsed : [parsed];
	const [statement] = statements;
	if (statements.length !== 1 || !isRecord(statement)) {
		return { ok: false, error: new StatementCountError(statements.length) };
	}
	return { ok: true, value: statement };
}

function withCtes(ctes: readonly CteDefinition[], node: LineageAstNode): LineageAstNode {
	if (ctes.length === 0) {
		return node;
	}
	switch (node.kind) {
		case "WriteStatement":
			return writeStatement(node.statement, node.target, [...ctes, ...node.ctes], node.children);
		case "QueryBody":
			return queryBody([...ctes, ...node.ctes], node.children);
		default:
			return otherNode([...ctes, node]);
	}
}

function convertStatement(statement: Record<string, unknown>): LineageAstNode {
	switch (statement.type) {
		case "select":
			return convertSelect(statement);
		case "insert":
		case "replace":
			return writeStatement(
				"insert",
				firstTable(statement.table),
				convertWith(statement.with),
				convertEntries(statement, SKIP_WRITE),
			);
		case "create":
			return convertCreate(statement);
		default:
			return otherNode(convertEntries(statement, NO_SKIP));
	}
}

function convertCreate(statement: Record<string, unknown>): LineageAstNode {
	if (statement.keyword === "view") {
		return writeStatement(
			"create_view",
			viewTarget(statement.view) ?? firstTable(statement.view) ?? firstTable(statement.table),
			convertWith(statement.with),
			convertEntries(statement, SKIP_CREATE_VIEW),
		);
	}

	if (statement.keyword === "table") {
		return writeStatement(
			"create_table",
			firstTable(statement.table),
			convertWith(statement.with),
			convertEntries(statement, SKIP_WRITE),
		);
	}

	return otherNode(convertEntries(statement, NO_SKIP));
}

const NO_SKIP: ReadonlySet<string> = new Set();
const SKIP_SELECT: ReadonlySet<string> = new Set(["with", "from"]);
const SKIP_WRITE: ReadonlySet<string> = new Set(["with", "table"]);
const SKIP_CREATE_VIEW: ReadonlySet<string> = new Set(["with", "table", "view"]);

function convertSelect(select: Record<string, unknown>): LineageAstNode {
	const children: LineageAstNode[] = [];

	if (Array.isArray(select.from)) {
		for (const item of select.from) {
			children.push(...convertFromItem(item));
		}
	}
	children.push(...convertEntries(select, SKIP_SELECT));

	return queryBody(convertWith(select.with), children);
}

/**
 * A `FROM` or `JOIN` item: a table, or a subquery, `UNNEST`, `VALUES` and so on.
 */
function convertFromItem(item: unknown): LineageAstNode[] {
	if (isRecord(item) && typeof item.table === "string" && item.type !== "column_ref") {
		return [fromTable(item), ...convertValue(item.on)];
	}
	return convertValue(item);
}

function fromTable(item: Record<string, unknown>): TableReference {
	return tableReference(qualifiedName([item.db, item.schema, item.table]));
}

function firstTable(value: unknown): TableReference | undefined {
	const first = Array.isArray(value) ? value[0] : value;
	if (isRecord(first) && typeof first.table === "string") {
		return fromTable(first);
	}
	return undefined;
}

function viewTarget(value: unknown): TableReference | undefined {
	if (isRecord(value) && typeof value.view === "string") {
		return tableReference(qualifiedName([value.db, value.schema, value.view]));
	}
	return undefined;
}

function cteAlias(name: unknown): string | undefined {
	if (typeof name === "string") {
		return name;
	}
	if (isRecord(name) && typeof name.value === "string") {
		return name.value;
	}
	return undefined;
}

function convertWith(value: unknown): CteDefinition[] {
	if (!Array.isArray(value)) {
		return [];
	}

	const definitions: CteDefinition[] = [];
	for (const item of value) {
		if (!isRecord(item)) {
			continue;
		}
		const alias = cteAlias(item.name);
		if (alias !== undefined) {
			definitions.push(cteDefinition(alias, singleNode(convertValue(item.stmt))));
		}
	}
	return definitions;
}

function convertEntries(record: Record<string, unknown>, skip: ReadonlySet<string>): LineageAstNode[] {
	const converted: LineageAstNode[] = [];
	for (const [key, value] of Object.entries(record)) {
		if (!skip.has(key)) {
			converted.push(...convertValue(value));
		}
	}
	return converted;
}

/**
 * Finds the queries nested anywhere in a parser value: subquery wrappers hold
 * them under `ast`, and a `SELECT` is recognized by its `type`.  Column
 * references and other expressions contribute no tables of their own.
 */
function convertValue(value: unknown): LineageAstNode[] {
	if (Array.isArray(value)) {
		return value.flatMap(convertValue);
	}
	if (!isRecord(value)) {
		return [];
	}
	if (value.type === "select") {
		return [convertSelect(value)];
	}
	if (value.type === "column_ref") {
		return [];
	}
	return convertEntries(value, NO_SKIP);
}
