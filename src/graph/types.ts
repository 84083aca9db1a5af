/**
 * Capability contracts shared by the graph backends. Backend-agnostic code
 * holds one of these interfaces, never a concrete class, so the sparse and
 * dense storage strategies stay interchangeable.
 */
import type { WeightAlgebra } from "../weights.js";

/** Whether inserting `(u, v)` also stores the mirrored `(v, u)`. */
export type GraphType = "direct" | "undirect";

/** Arc as observed through iteration. Weights are copied out of storage. */
export interface Arc<N> {
  readonly src: number;
  readonly dst: number;
  readonly weight: N;
}

export type NodeVisitor<N> = (index: number, weight: N) => void;
export type ArcVisitor<N> = (src: number, dst: number, weight: N) => void;
export type NodeWeightUpdate<N> = (index: number, current: N) => N;
export type ArcWeightUpdate<N> = (src: number, dst: number, current: N) => N;

/** Read-only view over a graph's topology. */
export interface GraphVisitor<N> {
  readonly type: GraphType;
  readonly algebra: WeightAlgebra<N>;
  /** Calls `visit` once per node in ascending index order. */
  visitNodes(visit: NodeVisitor<N>): void;
  /**
   * Calls `visit` once per stored arc entry. Both directions of an undirected
   * edge are stored, so both are visited.
   */
  visitArcs(visit: ArcVisitor<N>): void;
  nodeCount(): number;
  /** Number of stored arc entries; see each backend for duplicate handling. */
  arcCount(): number;
  /** `nodeCount() + arcCount()`. */
  totalEntries(): number;
}

/** Direct lookup of a single arc's weight. */
export interface ArcCost<N> {
  /** Throws {@link MissingArcError} when no arc `src -> dst` is stored. */
  cost(src: number, dst: number): N;
}

/** Mutation and query surface implemented by every backend. */
export interface WeightedGraph<N> extends GraphVisitor<N>, ArcCost<N> {
  addDefaultArc(src: number, dst: number): void;
  addArc(src: number, dst: number, weight: N): void;
  /**
   * Rewrites every stored arc weight. Undirected graphs invoke `update` once
   * per logical edge, with `src <= dst`, and store the result in both
   * directions.
   */
  updateAllArcsWeight(update: ArcWeightUpdate<N>): void;
  updateAllNodesWeight(update: NodeWeightUpdate<N>): void;
  /** Assigns weights to ascending indices, stopping at the shorter side. */
  assignNodeWeights(weights: Iterable<N>): void;
  assignIndexedNodeWeights(entries: Iterable<readonly [number, N]>): void;
  nodeWeight(index: number): N;
  hasArc(src: number, dst: number): boolean;
  successors(node: number): Arc<N>[];
  nodes(): IterableIterator<[number, N]>;
  arcs(): IterableIterator<Arc<N>>;
}
