import { type LineageAstNode, findAll } from "../ast.ts";

/**
 * Name of the table the statement writes to, or `undefined` when it writes to
 * nothing.  When several write statements are present the last one wins.
 */
export function resolveTarget(root: LineageAstNode): string | undefined {
	let target: string | undefined;

	for (const statement of findAll(root, "WriteStatement")) {
		if (statement.target) {
			target = statement.target.name;
		}
	}

	return target;
}
