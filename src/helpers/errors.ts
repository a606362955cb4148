export class TableLineageError extends Error {}

export class UnexpectedCaseError extends TableLineageError {}

/**
 * Error reported when the SQL text is empty or only whitespace.
 */
export class EmptySqlError extends TableLineageError {
	constructor() {
		super("SQL text is empty");
	}
}

/**
 * Error reported when the SQL parser rejects the text.  The parser's own error
 * is kept as `cause`.
 */
export class SqlParseError extends TableLineageError {
	constructor(cause: unknown) {
		super(`Failed to parse SQL: ${cause instanceof Error ? cause.message : String(cause)}`, {
			cause,
		});
	}
}

/**
 * Error reported when the SQL text does not hold exactly one statement.
 */
export class StatementCountError extends TableLineageError {
	constructor(count: number) {
		super(`Expected exactly one SQL statement, but got ${count}`);
	}
}

/**
 * Error reported when building the lineage graph fails unexpectedly.
 */
export class LineageResolutionError extends TableLineageError {
	constructor(cause: unknown) {
		super(
			`Failed to resolve lineage: ${cause instanceof Error ? cause.message : String(cause)}`,
			{ cause },
		);
	}
}

/**
 * Error logged when a plugin's lineage listener throws.
 */
export class LineageListenerError extends TableLineageError {
	constructor(cause: unknown) {
		super(`Lineage listener failed: ${cause instanceof Error ? cause.message : String(cause)}`, {
			cause,
		});
	}
}

/**
 * Error thrown when a resolver is created with a dialect it does not know.
 */
export class InvalidDialectError extends TableLineageError {
	constructor(dialect: string, validDialects: readonly string[]) {
		super(`Invalid dialect: ${dialect}. Must be one of: ${validDialects.join(", ")}`);
	}
}

/**
 * Error thrown when a graph builder is mutated after `build()`.
 */
export class GraphAlreadyBuiltError extends TableLineageError {
	constructor() {
		super("Lineage graph has already been built");
	}
}
