import { type Lineage } from "../format.ts";
import { type TableLineageError } from "./errors.ts";
import { assertNever } from "./utils.ts";

export const LOG_LEVELS = ["resolve", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Describes what a resolution ran on: SQL text, a Kysely operation node
 * identified by its kind, or a query builder that failed to produce one.
 */
export type LineageSource =
	| { type: "sql"; sql: string }
	| { type: "operation-node"; kind: string }
	| { type: "query-builder" };

export interface ResolveLogEvent {
	readonly level: "resolve";
	readonly source: LineageSource;
	readonly lineage: Lineage;
	readonly durationMillis: number;
}

export interface ErrorLogEvent {
	readonly level: "error";
	readonly source: LineageSource;
	readonly error: TableLineageError;
	readonly durationMillis: number;
}

export type LogEvent = ResolveLogEvent | ErrorLogEvent;

export type Logger = (event: LogEvent) => void;

/**
 * Either the levels to print through the console, or a function that receives
 * every event.
 */
export type LogConfig = readonly LogLevel[] | Logger;

function describeSource(source: LineageSource): string {
	switch (source.type) {
		case "sql":
			return source.sql;
		case "operation-node":
			return `<${source.kind}>`;
		case "query-builder":
			return "<query builder>";
		default:
			return assertNever(source);
	}
}

function defaultLogger(event: LogEvent): void {
	if (event.level === "resolve") {
		console.log(`resolved lineage in ${event.durationMillis.toFixed(1)}ms`);
		console.log(describeSource(event.source));
		console.log(
			`${event.lineage.nodes.length} nodes, ${event.lineage.edges.length} edges`,
		);
	} else {
		console.error(`lineage resolution failed in ${event.durationMillis.toFixed(1)}ms`);
		console.error(describeSource(event.source));
		console.error(event.error);
	}
}

export class Log {
	readonly #levels: Readonly<Record<LogLevel, boolean>>;
	readonly #logger: Logger;

	constructor(config: LogConfig | undefined) {
		if (typeof config === "function") {
			this.#logger = config;
			this.#levels = { resolve: true, error: true };
		} else {
			this.#logger = defaultLogger;
			this.#levels = {
				resolve: config?.includes("resolve") ?? false,
				error: config?.includes("error") ?? false,
			};
		}
	}

	isLevelEnabled(level: LogLevel): boolean {
		return this.#levels[level];
	}

	/**
	 * Builds the event only when its level is enabled.
	 */
	log(level: LogLevel, getEvent: () => LogEvent): void {
		if (this.isLevelEnabled(level)) {
			this.#logger(getEvent());
		}
	}
}
