export {
	type LineageOptions,
	type LineageQuery,
	type LineageResult,
	LineageResolver,
	lineageResolver,
	resolveLineage,
	resolveQueryLineage,
	tryResolveLineage,
	tryResolveQueryLineage,
} from "./resolver.ts";
export { type LineageEvent, type LineageListener, LineagePlugin } from "./plugin.ts";

export {
	EMPTY_LINEAGE,
	type Lineage,
	type LineageNode,
	type NodeCategory,
	classifyNode,
	formatLineage,
} from "./format.ts";
export { type LineageEdge, LineageGraph, LineageGraphBuilder } from "./graph.ts";
export { type AssembledLineage, assembleLineage } from "./assemble.ts";
export {
	type CteDefinition,
	type LineageAstKind,
	type LineageAstNode,
	type OtherNode,
	type QueryBody,
	type TableReference,
	type WriteStatement,
	type WriteStatementType,
	childrenOf,
	find,
	findAll,
} from "./ast.ts";
export { type CteRegistry, buildCteRegistry } from "./helpers/cte-registry.ts";
export { resolveTarget } from "./helpers/target-resolver.ts";
export { traceDependencies } from "./helpers/dependency-tracer.ts";
export { fromOperationNode } from "./providers/operation-node.ts";
export {
	type ParseResult,
	SQL_DIALECTS,
	type SqlDialect,
	parseSql,
} from "./providers/sql-text.ts";

export type {
	ErrorLogEvent,
	LineageSource,
	LogConfig,
	LogEvent,
	LogLevel,
	Logger,
	ResolveLogEvent,
} from "./helpers/log.ts";
export {
	EmptySqlError,
	GraphAlreadyBuiltError,
	InvalidDialectError,
	LineageListenerError,
	LineageResolutionError,
	SqlParseError,
	StatementCountError,
	TableLineageError,
	UnexpectedCaseError,
} from "./helpers/errors.ts";
