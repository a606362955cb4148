import { UnexpectedCaseError } from "./errors.ts";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function assertNever(arg: never): never {
	throw new UnexpectedCaseError(`Unexpected case: ${JSON.stringify(arg)}`);
}

export function isRecord(input: unknown): input is Record<string, unknown> {
	return input !== null && typeof input === "object" && !Array.isArray(input);
}

/**
 * Joins the non-empty parts of a possibly qualified identifier with dots, e.g.
 * `["analytics", null, "orders"]` becomes `"analytics.orders"`.
 */
export function qualifiedName(parts: readonly unknown[]): string {
	return parts.filter((part): part is string => typeof part === "string" && part !== "").join(".");
}

export function nowMillis(): number {
	return performance.now();
}
