/**
 * Shared types used across the graph modules. Grouping the error catalogue in
 * one place keeps the codes surfaced by {@link Digraph} and
 * {@link RefDigraph} consistent.
 */

/**
 * Strongly typed catalogue of stable error codes grouped by feature family.
 * Callers can switch on the code rather than on the error class when errors
 * cross module boundaries.
 */
export const ERROR_CATALOG = {
  GRAPH: {
    NULL_ARGUMENT: "E-GRAPH-NULL-ARGUMENT",
    NOT_FOUND: "E-GRAPH-NOT-FOUND",
    CAPACITY: "E-GRAPH-CAPACITY",
    UNEXPECTED: "E-GRAPH-UNEXPECTED",
  },
  REF: {
    INCOMPLETE_RESOLUTION: "E-REF-INCOMPLETE-RESOLUTION",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

/** Utility type used to flatten the nested error catalogue. */
type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

/** Flattened version of {@link ERROR_CATALOG} used for ergonomic lookups. */
type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

/**
 * Builds a flattened object whose properties map to their fully qualified error
 * codes (e.g. `GRAPH_NOT_FOUND`).
 */
function flattenCatalog<T extends Record<string, Record<string, string>>>(
  catalog: T,
): FlattenCatalog<T> {
  const flat: Record<string, string> = {};
  for (const familyKey of Object.keys(catalog) as Array<keyof T & string>) {
    const family = catalog[familyKey];
    for (const codeKey of Object.keys(family) as Array<keyof T[typeof familyKey] & string>) {
      flat[`${familyKey}_${codeKey}`] = family[codeKey];
    }
  }
  return Object.freeze(flat) as FlattenCatalog<T>;
}

/** Flat access to all stable error codes (e.g. `ERROR_CODES.GRAPH_NOT_FOUND`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union type representing every stable error code emitted by the graphs. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];
