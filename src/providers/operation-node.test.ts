import assert from "node:assert/strict";
import { test } from "node:test";

import { cteDefinition, queryBody, tableReference, writeStatement } from "../ast.ts";
import { db } from "../__tests__/sqlite.ts";
import { fromOperationNode } from "./operation-node.ts";

test("operation node: insert from select", () => {
	const query = db
		.insertInto("sales_summary")
		.expression(db.selectFrom("raw_sales").select(["region", "amount"]));

	assert.deepStrictEqual(
		fromOperationNode(query.toOperationNode()),
		writeStatement("insert", tableReference("sales_summary"), [], [
			queryBody([], [tableReference("raw_sales")]),
		]),
	);
});

test("operation node: CTEs attached to an insert", () => {
	const query = db
		.with("filtered", (qb) => qb.selectFrom("orders").selectAll().where("amount", ">", 0))
		.insertInto("report")
		.expression((eb) => eb.selectFrom("filtered").selectAll());

	assert.deepStrictEqual(
		fromOperationNode(query.toOperationNode()),
		writeStatement(
			"insert",
			tableReference("report"),
			[cteDefinition("filtered", queryBody([], [tableReference("orders")]))],
			[queryBody([], [tableReference("filtered")])],
		),
	);
});

test("operation node: column qualifiers are not table references", () => {
	const query = db
		.selectFrom("orders as o")
		.innerJoin("customers as c", "c.id", "o.customer_id")
		.select(["o.id", "c.name"])
		.where("c.region", "=", "north");

	assert.deepStrictEqual(
		fromOperationNode(query.toOperationNode()),
		queryBody([], [tableReference("orders"), tableReference("customers")]),
	);
});

test("operation node: subqueries in where clauses", () => {
	const query = db
		.selectFrom("orders")
		.selectAll()
		.where("customer_id", "in", db.selectFrom("customers").select("id"));

	assert.deepStrictEqual(
		fromOperationNode(query.toOperationNode()),
		queryBody([], [tableReference("orders"), queryBody([], [tableReference("customers")])]),
	);
});

test("operation node: schema-qualified tables", () => {
	const query = db
		.withSchema("analytics")
		.insertInto("report")
		.expression((eb) => eb.selectFrom("orders").selectAll());

	assert.deepStrictEqual(
		fromOperationNode(query.toOperationNode()),
		writeStatement("insert", tableReference("analytics.report"), [], [
			queryBody([], [tableReference("analytics.orders")]),
		]),
	);
});

test("operation node: create view as select", () => {
	const query = db.schema
		.createView("north_orders")
		.as(
			db
				.selectFrom("orders")
				.innerJoin("customers", "customers.id", "orders.customer_id")
				.selectAll("orders")
				.where("customers.region", "=", "north"),
		);

	assert.deepStrictEqual(
		fromOperationNode(query.toOperationNode()),
		writeStatement("create_view", tableReference("north_orders"), [], [
			queryBody([], [tableReference("orders"), tableReference("customers")]),
		]),
	);
});

test("operation node: statements without queries", () => {
	const query = db.deleteFrom("report").where("amount", "=", 0);

	assert.deepStrictEqual(fromOperationNode(query.toOperationNode()), tableReference("report"));
});
