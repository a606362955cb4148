import type * as k from "kysely";

import { type LineageAstNode } from "./ast.ts";
import { assembleLineage } from "./assemble.ts";
import { EMPTY_LINEAGE, type Lineage, formatLineage } from "./format.ts";
import {
	InvalidDialectError,
	LineageResolutionError,
	type TableLineageError,
} from "./helpers/errors.ts";
import { type LineageSource, Log, type LogConfig } from "./helpers/log.ts";
import { type Result, nowMillis } from "./helpers/utils.ts";
import { fromOperationNode } from "./providers/operation-node.ts";
import {
	DEFAULT_DIALECT,
	type ParseResult,
	SQL_DIALECTS,
	type SqlDialect,
	isSqlDialect,
	parseSql,
} from "./providers/sql-text.ts";

export type LineageResult = Result<Lineage, TableLineageError>;

export interface LineageOptions {
	/**
	 * Dialect the SQL text is parsed with.  Defaults to `"mysql"`.
	 */
	readonly dialect?: SqlDialect;

	/**
	 * Levels to log through the console, or a function receiving every log
	 * event.  Nothing is logged by default.
	 */
	readonly log?: LogConfig;
}

/**
 * Anything Kysely can turn into an operation node: a query builder, a schema
 * builder, or the node itself.
 */
export type LineageQuery = k.OperationNodeSource | k.OperationNode;

function toOperationNode(query: LineageQuery): Result<k.OperationNode, TableLineageError> {
	try {
		return { ok: true, value: "toOperationNode" in query ? query.toOperationNode() : query };
	} catch (error) {
		return { ok: false, error: new LineageResolutionError(error) };
	}
}

/**
 * Resolves table-level lineage for single SQL statements.
 *
 * A resolver holds only its options; every call builds and discards its own
 * graph, so one resolver can be shared freely.
 */
export class LineageResolver {
	readonly #dialect: SqlDialect;
	readonly #log: Log;

	constructor(options: LineageOptions = {}) {
		const dialect = options.dialect ?? DEFAULT_DIALECT;
		if (!isSqlDialect(dialect)) {
			throw new InvalidDialectError(dialect, SQL_DIALECTS);
		}
		this.#dialect = dialect;
		this.#log = new Log(options.log);
	}

	get dialect(): SqlDialect {
		return this.#dialect;
	}

	/**
	 * Resolves the lineage of one SQL statement, reporting a parse failure as
	 * an error instead of an empty graph.
	 */
	tryResolve(sql: string): LineageResult {
		return this.#resolve({ type: "sql", sql }, () => parseSql(sql, this.#dialect));
	}

	/**
	 * Resolves the lineage of one SQL statement.  Any failure yields an empty
	 * graph, which a valid statement without tables yields as well.
	 *
	 * @example
	 * ```ts
	 * lineageResolver().resolve("INSERT INTO sales_summary SELECT * FROM raw_sales");
	 * // {
	 * //   nodes: [
	 * //     { id: "raw_sales", label: "RAW: raw_sales", category: "raw" },
	 * //     { id: "sales_summary", label: "sales_summary", category: "target" },
	 * //   ],
	 * //   edges: [{ from: "raw_sales", to: "sales_summary" }],
	 * // }
	 * ```
	 */
	resolve(sql: string): Lineage {
		return orEmpty(this.tryResolve(sql));
	}

	tryResolveQuery(query: LineageQuery): LineageResult {
		const node = toOperationNode(query);
		if (!node.ok) {
			this.#report({ type: "query-builder" }, node, 0);
			return node;
		}
		const operationNode = node.value;
		return this.#resolve({ type: "operation-node", kind: operationNode.kind }, () =>
			convertQuery(operationNode),
		);
	}

	/**
	 * Resolves the lineage of a Kysely query without compiling it.
	 */
	resolveQuery(query: LineageQuery): Lineage {
		return orEmpty(this.tryResolveQuery(query));
	}

	#resolve(source: LineageSource, parse: () => ParseResult): LineageResult {
		const startTime = nowMillis();
		const result = buildLineage(parse());
		this.#report(source, result, nowMillis() - startTime);
		return result;
	}

	#report(source: LineageSource, result: LineageResult, durationMillis: number): void {
		if (result.ok) {
			const lineage = result.value;
			this.#log.log("resolve", () => ({ level: "resolve", source, lineage, durationMillis }));
		} else {
			const error = result.error;
			this.#log.log("error", () => ({ level: "error", source, error, durationMillis }));
		}
	}
}

function convertQuery(node: k.OperationNode): ParseResult {
	try {
		return { ok: true, value: fromOperationNode(node) };
	} catch (error) {
		return { ok: false, error: new LineageResolutionError(error) };
	}
}

function buildLineage(parsed: ParseResult): LineageResult {
	if (!parsed.ok) {
		return parsed;
	}
	return formatAst(parsed.value);
}

function formatAst(ast: LineageAstNode): LineageResult {
	try {
		const { graph, registry, target } = assembleLineage(ast);
		return { ok: true, value: formatLineage(graph, registry, target) };
	} catch (error) {
		return { ok: false, error: new LineageResolutionError(error) };
	}
}

function orEmpty(result: LineageResult): Lineage {
	return result.ok ? result.value : EMPTY_LINEAGE;
}

export const lineageResolver = (options?: LineageOptions) => new LineageResolver(options);

/**
 * Resolves the lineage of one SQL statement; `{ nodes: [], edges: [] }` when it
 * cannot be parsed.
 */
export function resolveLineage(sql: string, options?: LineageOptions): Lineage {
	return new LineageResolver(options).resolve(sql);
}

export function tryResolveLineage(sql: string, options?: LineageOptions): LineageResult {
	return new LineageResolver(options).tryResolve(sql);
}

export function resolveQueryLineage(query: LineageQuery, options?: LineageOptions): Lineage {
	return new LineageResolver(options).resolveQuery(query);
}

export function tryResolveQueryLineage(
	query: LineageQuery,
	options?: LineageOptions,
): LineageResult {
	return new LineageResolver(options).tryResolveQuery(query);
}
