/**
 * Backend-neutral representation of a graph used to move it between storage
 * strategies or across a serialization boundary. A form is built from any
 * {@link GraphVisitor}, replayed into a freshly allocated backend, then
 * discarded.
 */
import type { GraphFactory } from "../graph/backends.js";
import { CanonicalDecodeError, GraphInputError, type CanonicalDecodeIssue } from "../graph/errors.js";
import type { GraphType, GraphVisitor, WeightedGraph } from "../graph/types.js";
import type { StructuredLogger } from "../logger.js";
import { countZeros, type WeightAlgebra } from "../weights.js";

/** Node weights, either one per index or only the non-zero ones. */
export type CanonicalNodes<N> =
  | { readonly kind: "extended"; readonly weights: readonly N[] }
  | {
      readonly kind: "compact";
      readonly count: number;
      /** `[index, weight]` pairs sorted by index; omitted indices are zero. */
      readonly weights: ReadonlyArray<readonly [number, N]>;
    };

/** Arcs, with (`weighted`) or without (`simple`, replayed as zero) weights. */
export type CanonicalArcs<N> =
  | { readonly kind: "simple"; readonly pairs: ReadonlyArray<readonly [number, number]> }
  | { readonly kind: "weighted"; readonly triples: ReadonlyArray<readonly [number, number, N]> };

export interface CanonicalForm<N> {
  readonly type: GraphType;
  readonly nodes: CanonicalNodes<N>;
  readonly arcs: CanonicalArcs<N>;
}

export type CanonicalArcsKind = CanonicalArcs<unknown>["kind"];

/** Compact layout wins when strictly more than about half the weights are zero. */
export function shouldCompactNodes(total: number, zeros: number): boolean {
  return 2 * zeros > total + 1;
}

export function buildCanonicalNodes<N>(weights: readonly N[], algebra: WeightAlgebra<N>): CanonicalNodes<N> {
  const zeros = countZeros(weights, algebra);
  if (!shouldCompactNodes(weights.length, zeros)) {
    return { kind: "extended", weights: [...weights] };
  }
  const listed: Array<readonly [number, N]> = [];
  weights.forEach((weight, index) => {
    if (!algebra.isZero(weight)) {
      listed.push([index, weight]);
    }
  });
  return { kind: "compact", count: weights.length, weights: listed };
}

export function canonicalNodeCount<N>(nodes: CanonicalNodes<N>): number {
  return nodes.kind === "compact" ? nodes.count : nodes.weights.length;
}

export interface ToCanonicalOptions {
  /** Defaults to `weighted`; `simple` drops the weights. */
  readonly arcs?: CanonicalArcsKind;
  readonly logger?: StructuredLogger;
}

/**
 * Captures a graph. Arcs are recorded verbatim from {@link GraphVisitor.visitArcs},
 * so an undirected graph contributes both directions and a sparse graph its
 * duplicates.
 */
export function toCanonical<N>(graph: GraphVisitor<N>, options: ToCanonicalOptions = {}): CanonicalForm<N> {
  const weights: N[] = [];
  graph.visitNodes((_, weight) => weights.push(weight));
  const nodes = buildCanonicalNodes(weights, graph.algebra);

  const arcsKind = options.arcs ?? "weighted";
  let arcs: CanonicalArcs<N>;
  if (arcsKind === "simple") {
    const pairs: Array<readonly [number, number]> = [];
    graph.visitArcs((src, dst) => pairs.push([src, dst]));
    arcs = { kind: "simple", pairs };
  } else {
    const triples: Array<readonly [number, number, N]> = [];
    graph.visitArcs((src, dst, weight) => triples.push([src, dst, weight]));
    arcs = { kind: "weighted", triples };
  }

  options.logger?.debug("canonical_form_built", {
    type: graph.type,
    node_layout: nodes.kind,
    node_count: weights.length,
    arc_layout: arcs.kind,
    arc_entries: arcs.kind === "simple" ? arcs.pairs.length : arcs.triples.length,
  });

  return { type: graph.type, nodes, arcs };
}

export interface CanonicalLimits {
  /** Largest node count accepted. Unbounded when omitted. */
  readonly maxNodes?: number;
}

/**
 * Structural checks run before any allocation. Returns every issue found;
 * an empty list means the form can be replayed safely.
 */
export function validateCanonical<N>(form: CanonicalForm<N>, limits: CanonicalLimits = {}): CanonicalDecodeIssue[] {
  const issues: CanonicalDecodeIssue[] = [];
  const count = canonicalNodeCount(form.nodes);

  if (!Number.isSafeInteger(count) || count < 0) {
    issues.push({ path: "/nodes/count", message: `node count must be a non-negative integer, received ${count}` });
    return issues;
  }
  if (limits.maxNodes !== undefined && count > limits.maxNodes) {
    issues.push({ path: "/nodes", message: `node count ${count} exceeds the limit of ${limits.maxNodes}` });
    return issues;
  }

  if (form.nodes.kind === "compact") {
    let previous = -1;
    form.nodes.weights.forEach(([index], position) => {
      const path = `/nodes/weights/${position}`;
      if (!isIndex(index, count)) {
        issues.push({ path, message: `node index ${index} is outside [0, ${count})` });
      } else if (index <= previous) {
        issues.push({ path, message: `node index ${index} is not strictly ascending` });
      }
      previous = Math.max(previous, index);
    });
  }

  const endpoints: Array<readonly [number, number]> =
    form.arcs.kind === "simple" ? [...form.arcs.pairs] : form.arcs.triples.map(([src, dst]) => [src, dst] as const);
  endpoints.forEach(([src, dst], position) => {
    if (!isIndex(src, count)) {
      issues.push({ path: `/arcs/${position}/0`, message: `source index ${src} is outside [0, ${count})` });
    }
    if (!isIndex(dst, count)) {
      issues.push({ path: `/arcs/${position}/1`, message: `destination index ${dst} is outside [0, ${count})` });
    }
  });

  return issues;
}

function isIndex(value: number, count: number): boolean {
  return Number.isInteger(value) && value >= 0 && value < count;
}

export interface FromCanonicalOptions extends CanonicalLimits {
  readonly logger?: StructuredLogger;
}

/**
 * Materializes a form into a fresh backend. The form is validated first; on
 * failure {@link CanonicalDecodeError} is thrown and no graph is returned.
 * A backend refusing the node count (see `WEIGHTGRAPH_MAX_DENSE_CELLS`) is
 * reported the same way.
 */
export function fromCanonical<N, G extends WeightedGraph<N>>(
  form: CanonicalForm<N>,
  backend: GraphFactory<N, G>,
  algebra: WeightAlgebra<N>,
  options: FromCanonicalOptions = {},
): G {
  const issues = validateCanonical(form, options);
  if (issues.length > 0) {
    rejectForm(issues, options.logger);
  }

  let graph: G;
  try {
    graph = backend(canonicalNodeCount(form.nodes), form.type, algebra);
  } catch (error) {
    if (error instanceof GraphInputError) {
      rejectForm([{ path: "/nodes", message: error.message }], options.logger);
    }
    throw error;
  }
  applyCanonicalNodes(graph, form.nodes);
  applyCanonicalArcs(graph, form.arcs);
  return graph;
}

function rejectForm(issues: CanonicalDecodeIssue[], logger: StructuredLogger | undefined): never {
  logger?.warn("canonical_form_rejected", { issues });
  throw new CanonicalDecodeError(issues);
}

export function applyCanonicalNodes<N>(graph: WeightedGraph<N>, nodes: CanonicalNodes<N>): void {
  if (nodes.kind === "extended") {
    graph.assignNodeWeights(nodes.weights);
  } else {
    graph.assignIndexedNodeWeights(nodes.weights);
  }
}

/**
 * Replays arcs through a conditional insert. Undirected forms already hold
 * both directions, so only entries with `src <= dst` are inserted and the
 * backend's own mirroring restores the other half.
 */
export function applyCanonicalArcs<N>(graph: WeightedGraph<N>, arcs: CanonicalArcs<N>): void {
  if (arcs.kind === "simple") {
    const zero = graph.algebra.zero();
    for (const [src, dst] of arcs.pairs) {
      replayArc(graph, src, dst, zero);
    }
    return;
  }
  for (const [src, dst, weight] of arcs.triples) {
    replayArc(graph, src, dst, weight);
  }
}

function replayArc<N>(graph: WeightedGraph<N>, src: number, dst: number, weight: N): void {
  if (graph.type === "direct" || src <= dst) {
    graph.addArc(src, dst, weight);
  }
}

/** Copies a graph into another backend through its canonical form. */
export function transcode<N, G extends WeightedGraph<N>>(
  graph: WeightedGraph<N>,
  backend: GraphFactory<N, G>,
  options: FromCanonicalOptions = {},
): G {
  return fromCanonical(toCanonical(graph, { logger: options.logger }), backend, graph.algebra, options);
}
