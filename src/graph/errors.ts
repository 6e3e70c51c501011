import { inspect } from "node:util";

import { ERROR_CODES, type ErrorCode } from "../types.js";

/** Renders an arbitrary vertex or reference for inclusion in an error message. */
export function describeValue(value: unknown): string {
  return typeof value === "string" ? value : inspect(value, { depth: 2, breakLength: Infinity });
}

/**
 * Base error thrown by the graph modules. Every subclass carries a stable
 * {@link ErrorCode} so callers can branch on the failure without relying on
 * `instanceof` checks across bundles.
 */
export class GraphError extends Error {
  /** Stable error code. */
  public readonly code: ErrorCode;

  /** Optional hint describing how to recover from the error. */
  public readonly hint?: string;

  /** Optional structured details attached to the failure. */
  public readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, hint?: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "GraphError";
    this.code = code;
    this.hint = hint;
    this.details = details;
  }
}

/** Error thrown when a vertex, edge endpoint or resolver is `null` or `undefined`. */
export class NullArgumentError extends GraphError {
  public readonly argument: string;

  constructor(argument: string) {
    super(ERROR_CODES.GRAPH_NULL_ARGUMENT, `${argument} must not be null or undefined`, undefined, {
      argument,
    });
    this.name = "NullArgumentError";
    this.argument = argument;
  }
}

/** Error thrown when a degree or adjacency query targets a vertex that was never added. */
export class VertexNotFoundError extends GraphError {
  public readonly vertex: unknown;

  constructor(vertex: unknown) {
    super(ERROR_CODES.GRAPH_NOT_FOUND, `vertex not found: ${describeValue(vertex)}`, "add the vertex before querying it");
    this.name = "VertexNotFoundError";
    this.vertex = vertex;
  }
}

/** Error thrown when the initial capacity hint is not a non-negative integer. */
export class CapacityError extends GraphError {
  constructor(received: unknown) {
    super(
      ERROR_CODES.GRAPH_CAPACITY,
      `initial capacity must be a non-negative integer (received ${describeValue(received)})`,
      undefined,
      { received },
    );
    this.name = "CapacityError";
  }
}

/**
 * Error thrown when a query runs while some references declared through
 * `addVertexRef`/`addEdgeRef` have no matching object. The graph is left as it
 * was: adding the missing vertices and retrying the query succeeds.
 */
export class IncompleteResolutionError<R = unknown> extends GraphError {
  public readonly references: readonly R[];

  constructor(references: readonly R[]) {
    super(
      ERROR_CODES.REF_INCOMPLETE_RESOLUTION,
      `missing vertex references: ${references.map(describeValue).join(", ")}`,
      "add a vertex resolving to each missing reference, then retry",
      { references: [...references] },
    );
    this.name = "IncompleteResolutionError";
    this.references = references;
  }
}

/**
 * Rejects `null` and `undefined` with a {@link NullArgumentError}. Generic
 * vertex types may legitimately admit other falsy values such as `0` or `""`.
 */
export function requireValue<T>(value: T | null | undefined, argument: string): T {
  if (value === null || value === undefined) {
    throw new NullArgumentError(argument);
  }
  return value;
}
