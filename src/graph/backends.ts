import type { WeightAlgebra } from "../weights.js";
import { DenseGraph } from "./dense.js";
import { SparseGraph } from "./sparse.js";
import type { GraphType, WeightedGraph } from "./types.js";

/** Allocates an empty graph in one storage strategy. */
export type GraphFactory<N, G extends WeightedGraph<N> = WeightedGraph<N>> = (
  nodeCount: number,
  type: GraphType,
  algebra: WeightAlgebra<N>,
) => G;

export type BackendName = "sparse" | "dense";

export function sparseBackend<N>(nodeCount: number, type: GraphType, algebra: WeightAlgebra<N>): SparseGraph<N> {
  return new SparseGraph(nodeCount, type, algebra);
}

export function denseBackend<N>(nodeCount: number, type: GraphType, algebra: WeightAlgebra<N>): DenseGraph<N> {
  return new DenseGraph(nodeCount, type, algebra);
}

/** Resolves a backend by name. */
export function backendFor<N>(name: BackendName): GraphFactory<N> {
  return name === "sparse" ? sparseBackend : denseBackend;
}
