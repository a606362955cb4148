/**
 * A statement written as `WITH ... INSERT`, `WITH ... CREATE` or
 * `WITH ... REPLACE`, split where the write begins.
 */
export interface LeadingWith {
	/** The `WITH` list, without the statement it belongs to. */
	readonly withClause: string;
	readonly statement: string;
}

const WRITE_KEYWORDS: ReadonlySet<string> = new Set(["insert", "replace", "create"]);

const WORD = /[A-Za-z_][A-Za-z0-9_$]*/y;

/**
 * Index just past a comment or quoted string starting at `index`, or `index`
 * itself when none starts there.
 */
function skipQuotedOrComment(sql: string, index: number): number {
	const char = sql[index];

	if (char === "-" && sql[index + 1] === "-") {
		const end = sql.indexOf("\n", index);
		return end === -1 ? sql.length : end + 1;
	}

	if (char === "/" && sql[index + 1] === "*") {
		const end = sql.indexOf("*/", index + 2);
		return end === -1 ? sql.length : end + 2;
	}

	if (char === "'" || char === '"' || char === "`") {
		let i = index + 1;
		while (i < sql.length && sql[i] !== char) {
			i += sql[i] === "\\" ? 2 : 1;
		}
		return Math.min(i + 1, sql.length);
	}

	return index;
}

/**
 * Finds the write statement that follows a leading `WITH` list.  Returns
 * `undefined` for anything else, including `WITH ... SELECT`, which needs no
 * splitting.
 *
 * @example
 * ```ts
 * splitLeadingWith("WITH a AS (SELECT 1) INSERT INTO t SELECT * FROM a");
 * // { withClause: "WITH a AS (SELECT 1)", statement: "INSERT INTO t SELECT * FROM a" }
 * ```
 */
export function splitLeadingWith(sql: string): LeadingWith | undefined {
	let depth = 0;
	let sawWith = false;
	let i = 0;

	while (i < sql.length) {
		const skipped = skipQuotedOrComment(sql, i);
		if (skipped !== i) {
			i = skipped;
			continue;
		}

		const char = sql[i];
		WORD.lastIndex = i;
		const word = WORD.exec(sql)?.[0];

		if (word !== undefined) {
			const keyword = word.toLowerCase();
			if (!sawWith) {
				if (keyword !== "with") {
					return undefined;
				}
				sawWith = true;
			} else if (depth === 0 && keyword === "select") {
				return undefined;
			} else if (depth === 0 && WRITE_KEYWORDS.has(keyword)) {
				return {
					withClause: sql.slice(0, i).trim(),
					statement: sql.slice(i).trim(),
				};
			}
			i += word.length;
			continue;
		}

		if (char === "(") {
			depth++;
		} else if (char === ")") {
			depth--;
		} else if (char === ";" && depth === 0) {
			return undefined;
		} else if (!sawWith && char !== undefined && char.trim() !== "") {
			return undefined;
		}
		i++;
	}

	return undefined;
}
