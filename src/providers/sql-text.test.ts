import assert from "node:assert/strict";
import { test } from "node:test";

import {
	type LineageAstNode,
	cteDefinition,
	findAll,
	queryBody,
	tableReference,
	writeStatement,
} from "../ast.ts";
import { EmptySqlError, SqlParseError, StatementCountError } from "../helpers/errors.ts";
import { type ParseResult, isSqlDialect, parseSql } from "./sql-text.ts";

function parsedAst(result: ParseResult): LineageAstNode {
	if (!result.ok) {
		throw result.error;
	}
	return result.value;
}

function tableNames(root: LineageAstNode): string[] {
	return findAll(root, "TableReference").map((table) => table.name);
}

test("sql text: plain select", () => {
	const ast = parsedAst(parseSql("SELECT id, amount FROM orders"));

	assert.deepStrictEqual(ast, queryBody([], [tableReference("orders")]));
});

test("sql text: insert from select", () => {
	const ast = parsedAst(parseSql("INSERT INTO sales_summary SELECT * FROM raw_sales"));

	assert.strictEqual(ast.kind, "WriteStatement");
	if (ast.kind === "WriteStatement") {
		assert.strictEqual(ast.statement, "insert");
		assert.deepStrictEqual(ast.target, tableReference("sales_summary"));
		assert.deepStrictEqual(ast.ctes, []);
	}
	assert.deepStrictEqual(tableNames(ast), ["sales_summary", "raw_sales"]);
});

test("sql text: CTEs become definitions with their bodies", () => {
	const ast = parsedAst(
		parseSql("WITH filtered AS (SELECT * FROM orders WHERE amount > 0) SELECT * FROM filtered"),
	);

	assert.deepStrictEqual(
		ast,
		queryBody(
			[cteDefinition("filtered", queryBody([], [tableReference("orders")]))],
			[tableReference("filtered")],
		),
	);
});

test("sql text: joined tables and qualified columns", () => {
	const ast = parsedAst(
		parseSql(
			"SELECT o.id, c.name FROM orders o JOIN customers c ON c.id = o.customer_id WHERE c.region = 'north'",
		),
	);

	assert.deepStrictEqual(ast, queryBody([], [tableReference("orders"), tableReference("customers")]));
});

test("sql text: subqueries in where clauses", () => {
	const ast = parsedAst(
		parseSql("SELECT * FROM orders WHERE customer_id IN (SELECT id FROM customers)"),
	);

	assert.deepStrictEqual(tableNames(ast), ["orders", "customers"]);
});

test("sql text: qualified table names keep their qualifier", () => {
	const ast = parsedAst(parseSql("INSERT INTO analytics.report SELECT * FROM staging.orders"));

	assert.deepStrictEqual(tableNames(ast), ["analytics.report", "staging.orders"]);
});

test("sql text: leading WITH list attaches to the insert", () => {
	const ast = parsedAst(
		parseSql(
			"WITH filtered AS (SELECT * FROM orders WHERE amount > 0) INSERT INTO report SELECT * FROM filtered",
		),
	);

	assert.deepStrictEqual(
		ast,
		writeStatement(
			"insert",
			tableReference("report"),
			[cteDefinition("filtered", queryBody([], [tableReference("orders")]))],
			[queryBody([], [tableReference("filtered")])],
		),
	);
});

test("sql text: leading WITH list with several CTEs", () => {
	const ast = parsedAst(
		parseSql(
			"WITH c1 AS (SELECT * FROM raw_sales), c2 AS (SELECT * FROM c1) " +
				"INSERT INTO sales_summary SELECT * FROM c2",
			"postgresql",
		),
	);

	assert.strictEqual(ast.kind, "WriteStatement");
	if (ast.kind === "WriteStatement") {
		assert.deepStrictEqual(
			ast.ctes.map((cte) => cte.alias),
			["c1", "c2"],
		);
	}
	assert.deepStrictEqual(tableNames(ast), ["sales_summary", "c2", "raw_sales", "c1"]);
});

test("sql text: insert with a column list", () => {
	const ast = parsedAst(
		parseSql("INSERT INTO report (id, customer_id, amount) SELECT id, customer_id, amount FROM orders"),
	);

	assert.deepStrictEqual(
		ast,
		writeStatement("insert", tableReference("report"), [], [queryBody([], [tableReference("orders")])]),
	);
});

test("sql text: create table as select", () => {
	const ast = parsedAst(parseSql("CREATE TABLE north_customers AS SELECT * FROM customers"));

	assert.deepStrictEqual(
		ast,
		writeStatement("create_table", tableReference("north_customers"), [], [
			queryBody([], [tableReference("customers")]),
		]),
	);
});

test("sql text: create table as a query with its own WITH list", () => {
	const ast = parsedAst(
		parseSql("CREATE TABLE report_copy AS WITH filtered AS (SELECT * FROM orders) SELECT * FROM filtered"),
	);

	assert.deepStrictEqual(
		ast,
		writeStatement("create_table", tableReference("report_copy"), [], [
			queryBody(
				[cteDefinition("filtered", queryBody([], [tableReference("orders")]))],
				[tableReference("filtered")],
			),
		]),
	);
});

test("sql text: create view as select", () => {
	const ast = parsedAst(
		parseSql("CREATE VIEW north_customers AS SELECT * FROM customers WHERE region = 'north'"),
	);

	assert.deepStrictEqual(
		ast,
		writeStatement("create_view", tableReference("north_customers"), [], [
			queryBody([], [tableReference("customers")]),
		]),
	);
});

test("sql text: create table with columns only", () => {
	const ast = parsedAst(parseSql("CREATE TABLE audit_log (id INT, note VARCHAR(20))"));

	assert.deepStrictEqual(ast, writeStatement("create_table", tableReference("audit_log"), [], []));
});

test("sql text: union members are child query bodies", () => {
	const ast = parsedAst(parseSql("SELECT id FROM orders UNION SELECT id FROM customers"));

	assert.deepStrictEqual(
		ast,
		queryBody([], [tableReference("orders"), queryBody([], [tableReference("customers")])]),
	);
});

test("sql text: select without tables", () => {
	assert.deepStrictEqual(parsedAst(parseSql("SELECT 1")), queryBody([], []));
});

test("sql text: postgres dialect", () => {
	const ast = parsedAst(
		parseSql("WITH recent AS (SELECT * FROM orders) SELECT * FROM recent", "postgresql"),
	);

	assert.deepStrictEqual(tableNames(ast), ["recent", "orders"]);
});

test("sql text: malformed SQL is a parse error", () => {
	const result = parseSql("SELEC * FORM x");

	assert.strictEqual(result.ok, false);
	if (!result.ok) {
		assert.ok(result.error instanceof SqlParseError);
		assert.ok(result.error.cause instanceof Error);
	}
});

test("sql text: blank SQL is rejected before parsing", () => {
	const result = parseSql("  \n\t ");

	assert.strictEqual(result.ok, false);
	if (!result.ok) {
		assert.ok(result.error instanceof EmptySqlError);
	}
});

test("sql text: several statements are rejected", () => {
	const result = parseSql("SELECT * FROM orders; SELECT * FROM customers");

	assert.strictEqual(result.ok, false);
	if (!result.ok) {
		assert.ok(result.error instanceof StatementCountError);
		assert.strictEqual(result.error.message, "Expected exactly one SQL statement, but got 2");
	}
});

test("isSqlDialect: known and unknown dialects", () => {
	assert.strictEqual(isSqlDialect("postgresql"), true);
	assert.strictEqual(isSqlDialect("oracle"), false);
});
