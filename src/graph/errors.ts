import { ERROR_CODES, type ErrorCode } from "../types.js";

/** Base class of every error raised by the graph backends and the codec. */
export class GraphError extends Error {
  public readonly code: ErrorCode;
  public readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "GraphError";
    this.code = code;
    this.details = details;
  }
}

/** Raised when a node index falls outside `[0, nodeCount)`. */
export class GraphIndexError extends GraphError {
  constructor(
    readonly index: number,
    readonly nodeCount: number,
    readonly role: string,
  ) {
    super(
      ERROR_CODES.GRAPH_INDEX_OUT_OF_RANGE,
      `${role} index ${index} is out of range for a graph of ${nodeCount} nodes`,
      { index, nodeCount, role },
    );
    this.name = "GraphIndexError";
  }
}

/** Raised by single-arc cost lookups when the requested arc is not stored. */
export class MissingArcError extends GraphError {
  constructor(
    readonly src: number,
    readonly dst: number,
  ) {
    super(ERROR_CODES.GRAPH_ARC_NOT_FOUND, `no arc stored from ${src} to ${dst}`, { src, dst });
    this.name = "MissingArcError";
  }
}

/** Raised when a constructor or helper receives an unusable argument. */
export class GraphInputError extends GraphError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super(ERROR_CODES.GRAPH_INVALID_INPUT, message, details);
    this.name = "GraphInputError";
  }
}

/** Problem found while encoding or decoding a canonical payload. */
export interface CanonicalDecodeIssue {
  /** JSON pointer to the offending location inside the payload. */
  path: string;
  message: string;
}

/**
 * Raised when a canonical payload cannot be turned into a graph. Every issue
 * found is reported at once; no graph is built.
 */
export class CanonicalDecodeError extends GraphError {
  constructor(readonly issues: CanonicalDecodeIssue[]) {
    super(
      ERROR_CODES.CANONICAL_DECODE_FAILED,
      issues.map((issue) => `${issue.path || "/"}: ${issue.message}`).join("; "),
      { issues },
    );
    this.name = "CanonicalDecodeError";
  }
}

/**
 * Raised when a graph holds weights its algebra cannot write back, such as
 * `NaN` or infinities under {@link numberWeights}.
 */
export class CanonicalEncodeError extends GraphError {
  constructor(readonly issues: CanonicalDecodeIssue[]) {
    super(
      ERROR_CODES.CANONICAL_ENCODE_FAILED,
      issues.map((issue) => `${issue.path}: ${issue.message}`).join("; "),
      { issues },
    );
    this.name = "CanonicalEncodeError";
  }
}
