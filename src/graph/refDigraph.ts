import type { StructuredLogger } from "../logger.js";
import { Digraph } from "./digraph.js";
import {
  describeValue,
  GraphError,
  IncompleteResolutionError,
  requireValue,
  VertexNotFoundError,
} from "./errors.js";
import { resolveDigraphOptions } from "./options.js";
import type { DigraphEdge, DigraphOptions, DirectedGraph } from "./types.js";
import { ERROR_CODES } from "../types.js";

/** Binding of a vertex slot: only a reference so far, or the real object. */
export type SlotBinding<T, R> =
  | { readonly state: "unresolved"; readonly ref: R }
  | { readonly state: "resolved"; readonly ref: R; readonly value: T };

/**
 * Identity of one vertex inside the delegate graph. The slot object is the
 * delegate's key; binding it to its object is the swap from reference to
 * object identity, so the delegate never needs to be re-keyed.
 */
export class VertexSlot<T, R> {
  constructor(public binding: SlotBinding<T, R>) {}
}

/**
 * A directed graph whose edges may be declared through references of type
 * `R` before the vertices of type `T` they point to are known.
 *
 * The `resolve` function maps every vertex to its reference. Vertices and
 * references that map to the same `R` designate the same vertex. Before any
 * structural query the pending references are swapped for their objects; a
 * reference with no matching object at that point raises
 * {@link IncompleteResolutionError} and leaves the graph untouched.
 *
 * ```ts
 * const graph = new RefDigraph((task: Task) => task.id);
 * graph.addEdgeRef(build, "compile");
 * graph.addVertex(compile);
 * graph.getTopologicalOrder(); // [build, compile]
 * ```
 */
export class RefDigraph<T, R> implements DirectedGraph<T> {
  readonly initialCapacity: number;

  private readonly resolve: (vertex: T) => R;
  private readonly logger: StructuredLogger;
  private slots = new Map<R, VertexSlot<T, R>>();
  private pendingVertices: T[] = [];
  private pendingReferences = new Set<R>();
  private delegate: Digraph<VertexSlot<T, R>>;

  constructor(resolve: (vertex: T) => R, options: DigraphOptions = {}) {
    this.resolve = requireValue(resolve, "resolve");
    const resolved = resolveDigraphOptions(options);
    this.initialCapacity = resolved.initialCapacity;
    this.logger = resolved.logger;
    this.delegate = new Digraph<VertexSlot<T, R>>({ initialCapacity: this.initialCapacity, logger: this.logger });
  }

  addVertex(vertex: T): boolean {
    return this.delegate.addVertex(this.slotForVertex(requireValue(vertex, "vertex")));
  }

  /**
   * Adds a vertex known only by its reference. The reference must be matched
   * by an object added through {@link addVertex} or {@link addEdge} before the
   * next query.
   *
   * @returns `true` when the graph changed.
   */
  addVertexRef(ref: R): boolean {
    return this.delegate.addVertex(this.slotForReference(requireValue(ref, "ref")));
  }

  addEdge(from: T, to: T | null | undefined): boolean {
    requireValue(from, "from");
    if (to === null || to === undefined) {
      return this.addVertex(from);
    }
    return this.delegate.addEdge(this.slotForVertex(from), this.slotForVertex(to));
  }

  /**
   * Adds the edge `from -> to`, naming the head by its reference. A `null` or
   * `undefined` reference only adds `from`.
   */
  addEdgeRef(from: T, to: R | null | undefined): boolean {
    requireValue(from, "from");
    if (to === null || to === undefined) {
      return this.addVertex(from);
    }
    return this.delegate.addEdge(this.slotForVertex(from), this.slotForReference(to));
  }

  /** Whether a vertex with the same reference as {@link vertex} was added. */
  hasVertex(vertex: T): boolean {
    return this.slots.has(this.resolve(requireValue(vertex, "vertex")));
  }

  getSize(): number {
    return this.delegate.getSize();
  }

  /** References still waiting for an object, in the order they were declared. */
  getPendingReferences(): R[] {
    return [...this.pendingReferences];
  }

  getVertices(): T[] {
    this.resolveReferences();
    return this.delegate.getVertices().map((slot) => this.valueOf(slot));
  }

  getEdges(): DigraphEdge<T>[] {
    this.resolveReferences();
    return this.delegate.getEdges().map((edge) => ({ from: this.valueOf(edge.from), to: this.valueOf(edge.to) }));
  }

  getInDegree(vertex: T): number {
    this.resolveReferences();
    return this.delegate.getInDegree(this.requireSlot(vertex));
  }

  getOutDegree(vertex: T): number {
    this.resolveReferences();
    return this.delegate.getOutDegree(this.requireSlot(vertex));
  }

  getCycle(): T[] | null {
    this.resolveReferences();
    const cycle = this.delegate.getCycle();
    return cycle ? cycle.map((slot) => this.valueOf(slot)) : null;
  }

  /** Same as {@link getCycle}, reporting each vertex by its reference. */
  getCycleRef(): R[] | null {
    const cycle = this.getCycle();
    return cycle ? cycle.map((vertex) => this.resolve(vertex)) : null;
  }

  getTopologicalOrder(): T[] | null {
    this.resolveReferences();
    const order = this.delegate.getTopologicalOrder();
    return order ? order.map((slot) => this.valueOf(slot)) : null;
  }

  /**
   * Swaps every pending reference for its object. Queries run this first;
   * calling it directly surfaces missing references early.
   *
   * @throws IncompleteResolutionError listing the references with no object.
   *   Nothing is modified in that case.
   */
  resolveReferences(): void {
    if (this.pendingVertices.length === 0 && this.pendingReferences.size === 0) {
      return;
    }

    const satisfied = new Set(this.pendingVertices.map((vertex) => this.resolve(vertex)));
    const missing = [...this.pendingReferences].filter((ref) => !satisfied.has(ref));
    if (missing.length > 0) {
      this.logger.warn("refdigraph_resolution_incomplete", { missing: missing.map(describeValue) });
      throw new IncompleteResolutionError(missing);
    }

    let bound = 0;
    for (const vertex of this.pendingVertices) {
      const ref = this.resolve(vertex);
      const slot = this.slots.get(ref);
      if (!slot) {
        throw new GraphError(ERROR_CODES.GRAPH_UNEXPECTED, `no slot for pending vertex ${describeValue(vertex)}`);
      }
      if (slot.binding.state === "unresolved") {
        slot.binding = { state: "resolved", ref, value: vertex };
        bound += 1;
      }
    }
    const references = this.pendingReferences.size;
    this.pendingVertices = [];
    this.pendingReferences.clear();
    this.logger.debug("refdigraph_resolved", { bound, references });
  }

  /** Deep copy with its own slots, pending sets and adjacency. */
  clone(): RefDigraph<T, R> {
    const copy = new RefDigraph<T, R>(this.resolve, { initialCapacity: this.initialCapacity, logger: this.logger });
    const copies = new Map<VertexSlot<T, R>, VertexSlot<T, R>>();
    for (const [ref, slot] of this.slots) {
      const duplicate = new VertexSlot<T, R>(slot.binding);
      copies.set(slot, duplicate);
      copy.slots.set(ref, duplicate);
    }
    const lookup = (slot: VertexSlot<T, R>): VertexSlot<T, R> => {
      const duplicate = copies.get(slot);
      if (!duplicate) {
        throw new GraphError(ERROR_CODES.GRAPH_UNEXPECTED, "delegate vertex has no slot");
      }
      return duplicate;
    };
    // Replaying vertices then edges in their original order reproduces the
    // delegate's indexes and adjacency order.
    for (const slot of this.delegate.getVertices()) {
      copy.delegate.addVertex(lookup(slot));
    }
    for (const edge of this.delegate.getEdges()) {
      copy.delegate.addEdge(lookup(edge.from), lookup(edge.to));
    }
    copy.pendingVertices = [...this.pendingVertices];
    copy.pendingReferences = new Set(this.pendingReferences);
    return copy;
  }

  /** Lists the delegate's adjacency; unresolved vertices print as `@ref`. */
  toString(): string {
    return this.delegate.render((slot) =>
      slot.binding.state === "resolved" ? describeValue(slot.binding.value) : `@${describeValue(slot.binding.ref)}`,
    );
  }

  /** Returns the slot for {@link vertex}, queuing the vertex for binding when needed. */
  private slotForVertex(vertex: T): VertexSlot<T, R> {
    const ref = this.resolve(vertex);
    const slot = this.slotFor(ref);
    if (slot.binding.state === "unresolved") {
      this.pendingVertices.push(vertex);
    }
    return slot;
  }

  /** Returns the slot for {@link ref}, recording the reference when it is not bound yet. */
  private slotForReference(ref: R): VertexSlot<T, R> {
    const slot = this.slotFor(ref);
    if (slot.binding.state === "unresolved") {
      this.pendingReferences.add(ref);
    }
    return slot;
  }

  private slotFor(ref: R): VertexSlot<T, R> {
    let slot = this.slots.get(ref);
    if (!slot) {
      slot = new VertexSlot<T, R>({ state: "unresolved", ref });
      this.slots.set(ref, slot);
    }
    return slot;
  }

  private requireSlot(vertex: T): VertexSlot<T, R> {
    const slot = this.slots.get(this.resolve(requireValue(vertex, "vertex")));
    if (!slot) {
      throw new VertexNotFoundError(vertex);
    }
    return slot;
  }

  /** Object bound to {@link slot}; only called after a successful resolution pass. */
  private valueOf(slot: VertexSlot<T, R>): T {
    if (slot.binding.state !== "resolved") {
      throw new GraphError(
        ERROR_CODES.GRAPH_UNEXPECTED,
        `vertex reference ${describeValue(slot.binding.ref)} is not bound to an object`,
      );
    }
    return slot.binding.value;
  }
}
