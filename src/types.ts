/**
 * Shared types used across the library. Grouping the error catalogue here
 * keeps codes consistent between the graph backends and the canonical codec.
 */

/**
 * Strongly typed catalogue of stable error codes grouped by feature family.
 * Callers can switch on the code instead of parsing messages.
 */
export const ERROR_CATALOG = {
  GRAPH: {
    INDEX_OUT_OF_RANGE: "E-GRAPH-INDEX-RANGE",
    ARC_NOT_FOUND: "E-GRAPH-ARC-NOTFOUND",
    INVALID_INPUT: "E-GRAPH-INVALID-INPUT",
  },
  CANONICAL: {
    DECODE_FAILED: "E-CANONICAL-DECODE",
    ENCODE_FAILED: "E-CANONICAL-ENCODE",
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
 * codes (e.g. `GRAPH_ARC_NOT_FOUND`).
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

/** Flat access to all stable error codes (e.g. `ERROR_CODES.GRAPH_INVALID_INPUT`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union type representing every stable error code raised by the library. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];
