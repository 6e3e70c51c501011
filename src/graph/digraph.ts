import { describeValue, requireValue, VertexNotFoundError } from "./errors.js";
import { resolveDigraphOptions } from "./options.js";
import { depthFirstPass, type TraversalResult } from "./traversal.js";
import type { DigraphEdge, DigraphOptions, DirectedGraph } from "./types.js";
import type { StructuredLogger } from "../logger.js";

/**
 * A directed graph of arbitrary vertices, permitting self-loops and parallel
 * edges.
 *
 * Each distinct vertex (by `Map` key equality) receives an integer index the
 * first time it is added; adjacency is stored per index as the ordered list of
 * successor indexes, duplicates included. Vertices are never removed so
 * indexes stay stable for the lifetime of the graph.
 *
 * Cycle detection and topological ordering share one depth-first pass whose
 * result is cached until the next structural mutation.
 *
 * Instances are not safe for interleaved mutation by concurrent workflows;
 * callers sharing a graph must serialise access themselves.
 */
export class Digraph<T> implements DirectedGraph<T> {
  /** Capacity hint supplied at construction. */
  readonly initialCapacity: number;

  private readonly logger: StructuredLogger;
  private vertices: T[] = [];
  private objectToIndex = new Map<T, number>();
  private adjacency: number[][] = [];
  private edgeCount = 0;
  private traversal: TraversalResult | null = null;

  constructor(options: DigraphOptions = {}) {
    const resolved = resolveDigraphOptions(options);
    this.initialCapacity = resolved.initialCapacity;
    this.logger = resolved.logger;
  }

  /**
   * Adds {@link vertex} if absent.
   *
   * @returns `true` when the graph changed.
   */
  addVertex(vertex: T): boolean {
    requireValue(vertex, "vertex");
    if (this.objectToIndex.has(vertex)) {
      return false;
    }
    this.indexOfOrAdd(vertex);
    return true;
  }

  /**
   * Adds the edge `from -> to`, adding either endpoint when absent. Existing
   * edges are not deduplicated. A `null` or `undefined` head only adds `from`.
   *
   * @returns `true` when a new edge instance was added, or, for a missing
   *   head, whether `from` was new.
   */
  addEdge(from: T, to: T | null | undefined): boolean {
    requireValue(from, "from");
    if (to === null || to === undefined) {
      return this.addVertex(from);
    }

    const tail = this.indexOfOrAdd(from);
    const head = this.indexOfOrAdd(to);
    this.adjacency[tail].push(head);
    this.edgeCount += 1;
    this.traversal = null;
    return true;
  }

  hasVertex(vertex: T): boolean {
    return this.objectToIndex.has(vertex);
  }

  getSize(): number {
    return this.vertices.length;
  }

  getEdgeCount(): number {
    return this.edgeCount;
  }

  /** Snapshot of the vertices in insertion order. */
  getVertices(): T[] {
    return [...this.vertices];
  }

  /**
   * Snapshot of every edge instance, ordered by the insertion index of the
   * tail and then by the order the edges were added from that tail.
   */
  getEdges(): DigraphEdge<T>[] {
    const edges: DigraphEdge<T>[] = [];
    this.adjacency.forEach((successors, tail) => {
      for (const head of successors) {
        edges.push({ from: this.vertices[tail], to: this.vertices[head] });
      }
    });
    return edges;
  }

  /** Heads of the edges leaving {@link vertex}, one entry per edge instance. */
  getSuccessors(vertex: T): T[] {
    return this.adjacency[this.requireIndex(vertex)].map((head) => this.vertices[head]);
  }

  /** Tails of the edges entering {@link vertex}, one entry per edge instance. */
  getPredecessors(vertex: T): T[] {
    const target = this.requireIndex(vertex);
    const predecessors: T[] = [];
    this.adjacency.forEach((successors, tail) => {
      for (const head of successors) {
        if (head === target) {
          predecessors.push(this.vertices[tail]);
        }
      }
    });
    return predecessors;
  }

  getInDegree(vertex: T): number {
    const target = this.requireIndex(vertex);
    let degree = 0;
    for (const successors of this.adjacency) {
      for (const head of successors) {
        if (head === target) {
          degree += 1;
        }
      }
    }
    return degree;
  }

  getOutDegree(vertex: T): number {
    return this.adjacency[this.requireIndex(vertex)].length;
  }

  getCycle(): T[] | null {
    const result = this.traverse();
    return result.acyclic ? null : result.cycle.map((index) => this.vertices[index]);
  }

  getTopologicalOrder(): T[] | null {
    const result = this.traverse();
    return result.acyclic ? result.order.map((index) => this.vertices[index]) : null;
  }

  /** Deep copy sharing no mutable state with this graph. Vertices themselves are shared. */
  clone(): Digraph<T> {
    const copy = new Digraph<T>({ initialCapacity: this.initialCapacity, logger: this.logger });
    copy.vertices = [...this.vertices];
    copy.objectToIndex = new Map(this.objectToIndex);
    copy.adjacency = this.adjacency.map((successors) => [...successors]);
    copy.edgeCount = this.edgeCount;
    copy.traversal = this.traversal;
    return copy;
  }

  /**
   * Renders one line per vertex, `label -> [head, head]`, labelling vertices
   * with {@link format}.
   */
  render(format: (vertex: T) => string): string {
    return this.vertices
      .map((vertex, index) => {
        const heads = this.adjacency[index].map((head) => format(this.vertices[head]));
        return `${format(vertex)} -> [${heads.join(", ")}]`;
      })
      .join("\n");
  }

  toString(): string {
    return this.render(describeValue);
  }

  private indexOfOrAdd(vertex: T): number {
    const existing = this.objectToIndex.get(vertex);
    if (existing !== undefined) {
      return existing;
    }
    const index = this.vertices.length;
    this.vertices.push(vertex);
    this.objectToIndex.set(vertex, index);
    this.adjacency.push([]);
    this.traversal = null;
    return index;
  }

  private requireIndex(vertex: T): number {
    const index = this.objectToIndex.get(requireValue(vertex, "vertex"));
    if (index === undefined) {
      throw new VertexNotFoundError(vertex);
    }
    return index;
  }

  private traverse(): TraversalResult {
    if (this.traversal) {
      return this.traversal;
    }
    const result = depthFirstPass(this.adjacency);
    if (!result.acyclic) {
      this.logger.debug("digraph_cycle_detected", { length: result.cycle.length - 1 });
    }
    this.traversal = result;
    return result;
  }
}
