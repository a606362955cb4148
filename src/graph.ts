import dagre, { type graphlib } from "dagre";

import { GraphAlreadyBuiltError } from "./helpers/errors.ts";

export interface LineageEdge {
	readonly from: string;
	readonly to: string;
}

/**
 * A directed lineage graph: an edge means "data flows from `from` to `to`".
 * Nodes and edges iterate in insertion order.
 */
export class LineageGraph {
	readonly #graph: graphlib.Graph;

	constructor(graph: graphlib.Graph) {
		this.#graph = graph;
	}

	nodes(): string[] {
		return this.#graph.nodes();
	}

	edges(): LineageEdge[] {
		return this.#graph.edges().map(({ v, w }) => ({ from: v, to: w }));
	}

	hasNode(name: string): boolean {
		return this.#graph.hasNode(name);
	}

	inDegree(name: string): number {
		const inEdges = this.#graph.inEdges(name);
		return Array.isArray(inEdges) ? inEdges.length : 0;
	}
}

/**
 * Accumulates the nodes and edges of one resolution.  Each resolution owns its
 * own builder.
 */
export class LineageGraphBuilder {
	readonly #graph = new dagre.graphlib.Graph({ directed: true, multigraph: false });
	#built = false;

	/**
	 * Adds a node unless it already exists; an existing node keeps its place.
	 */
	addNode(name: string): this {
		this.#assertNotBuilt();
		if (!this.#graph.hasNode(name)) {
			this.#graph.setNode(name, {});
		}
		return this;
	}

	/**
	 * Adds the edge `from -> to`, creating missing endpoints in that order.
	 * Self-loops are dropped and a repeated edge is kept once.
	 */
	addEdge(from: string, to: string): this {
		this.#assertNotBuilt();
		if (from === to) {
			return this;
		}
		this.addNode(from);
		this.addNode(to);
		this.#graph.setEdge(from, to);
		return this;
	}

	build(): LineageGraph {
		this.#assertNotBuilt();
		this.#built = true;
		return new LineageGraph(this.#graph);
	}

	#assertNotBuilt(): void {
		if (this.#built) {
			throw new GraphAlreadyBuiltError();
		}
	}
}
