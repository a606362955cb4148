import {
	type KyselyPlugin,
	type PluginTransformQueryArgs,
	type PluginTransformResultArgs,
	type QueryId,
	type QueryResult,
	type RootOperationNode,
	type UnknownRow,
} from "kysely";

import { type Lineage } from "./format.ts";
import { LineageListenerError } from "./helpers/errors.ts";
import { Log } from "./helpers/log.ts";
import { nowMillis } from "./helpers/utils.ts";
import { type LineageOptions, LineageResolver } from "./resolver.ts";

export interface LineageEvent {
	readonly queryId: QueryId;
	readonly kind: RootOperationNode["kind"];
	readonly lineage: Lineage;
}

export type LineageListener = (event: LineageEvent) => void;

/**
 * Reports the table lineage of every query a Kysely instance runs.  Queries
 * pass through unchanged.  Statements without tables are not reported.  An
 * error thrown by the listener goes to the `error` log level and does not
 * fail the query.
 *
 * @example
 * ```ts
 * const db = new Kysely<DB>({
 *   dialect,
 *   plugins: [new LineagePlugin((event) => lineageStore.push(event.lineage))],
 * });
 * ```
 */
export class LineagePlugin implements KyselyPlugin {
	readonly #resolver: LineageResolver;
	readonly #listener: LineageListener;
	readonly #log: Log;

	constructor(listener: LineageListener, options?: Omit<LineageOptions, "dialect">) {
		this.#resolver = new LineageResolver(options);
		this.#listener = listener;
		this.#log = new Log(options?.log);
	}

	transformQuery(args: PluginTransformQueryArgs): RootOperationNode {
		const lineage = this.#resolver.resolveQuery(args.node);
		if (lineage.nodes.length > 0) {
			this.#notify({ queryId: args.queryId, kind: args.node.kind, lineage });
		}
		return args.node;
	}

	#notify(event: LineageEvent): void {
		const startTime = nowMillis();
		try {
			this.#listener(event);
		} catch (cause) {
			const error = new LineageListenerError(cause);
			const durationMillis = nowMillis() - startTime;
			this.#log.log("error", () => ({
				level: "error",
				source: { type: "operation-node", kind: event.kind },
				error,
				durationMillis,
			}));
		}
	}

	async transformResult(args: PluginTransformResultArgs): Promise<QueryResult<UnknownRow>> {
		return args.result;
	}
}
