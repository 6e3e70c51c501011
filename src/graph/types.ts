import type { StructuredLogger } from "../logger.js";

/** A directed edge instance. Parallel edges appear once per instance. */
export interface DigraphEdge<T> {
  readonly from: T;
  readonly to: T;
}

/** Options accepted by the graph constructors. */
export interface DigraphOptions {
  /**
   * Capacity hint; must be a non-negative integer. Defaults to
   * `DIGRAPH_INITIAL_CAPACITY` (10 when unset).
   */
  initialCapacity?: number;
  /** Logger receiving traversal and resolution events. */
  logger?: StructuredLogger;
}

/**
 * Operations shared by {@link Digraph} and {@link RefDigraph}. Passing `null`
 * or `undefined` as the head of {@link addEdge} is equivalent to adding only
 * the tail vertex.
 */
export interface DirectedGraph<T> {
  addVertex(vertex: T): boolean;
  addEdge(from: T, to: T | null | undefined): boolean;
  hasVertex(vertex: T): boolean;
  getSize(): number;
  getVertices(): T[];
  getEdges(): DigraphEdge<T>[];
  getInDegree(vertex: T): number;
  getOutDegree(vertex: T): number;
  /** Returns one directed cycle with its first vertex repeated at the end, or `null`. */
  getCycle(): T[] | null;
  /** Returns a topological order of every vertex, or `null` when the graph has a cycle. */
  getTopologicalOrder(): T[] | null;
  clone(): DirectedGraph<T>;
  toString(): string;
}
