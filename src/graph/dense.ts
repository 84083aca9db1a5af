import { loadGraphConfig } from "../config/graphConfig.js";
import { numberWeights, type WeightAlgebra } from "../weights.js";
import { assertCellCount, assertNodeCount, assertNodeIndex } from "./bounds.js";
import { MissingArcError } from "./errors.js";
import type {
  Arc,
  ArcVisitor,
  ArcWeightUpdate,
  GraphType,
  NodeVisitor,
  NodeWeightUpdate,
  WeightedGraph,
} from "./types.js";

/**
 * Matrix backend: an `N x N` presence matrix and a parallel weight matrix,
 * both stored row-major. Unlike {@link SparseGraph}, inserting an arc whose
 * cell is already set leaves the stored weight and the arc count untouched.
 *
 * Construction throws {@link GraphInputError} when the matrix would exceed
 * `WEIGHTGRAPH_MAX_DENSE_CELLS`.
 */
export class DenseGraph<N> implements WeightedGraph<N> {
  private readonly weights: N[];
  private readonly presence: Uint8Array;
  private readonly arcWeights: N[];
  private storedArcs = 0;

  constructor(
    nodeCount: number,
    readonly type: GraphType,
    readonly algebra: WeightAlgebra<N>,
  ) {
    assertNodeCount(nodeCount);
    assertCellCount(nodeCount, loadGraphConfig().maxDenseCells);
    const cells = nodeCount * nodeCount;
    this.weights = Array.from({ length: nodeCount }, () => algebra.zero());
    this.presence = new Uint8Array(cells);
    this.arcWeights = Array.from({ length: cells }, () => algebra.zero());
  }

  /** Directed graph with `number` weights. */
  static direct(nodeCount: number): DenseGraph<number> {
    return new DenseGraph(nodeCount, "direct", numberWeights);
  }

  /** Undirected graph with `number` weights. */
  static undirect(nodeCount: number): DenseGraph<number> {
    return new DenseGraph(nodeCount, "undirect", numberWeights);
  }

  nodeCount(): number {
    return this.weights.length;
  }

  arcCount(): number {
    return this.storedArcs;
  }

  totalEntries(): number {
    return this.nodeCount() + this.arcCount();
  }

  addDefaultArc(src: number, dst: number): void {
    this.addArc(src, dst, this.algebra.zero());
  }

  addArc(src: number, dst: number, weight: N): void {
    assertNodeIndex(src, this.nodeCount(), "source");
    assertNodeIndex(dst, this.nodeCount(), "destination");
    this.setCell(src, dst, weight);
    if (this.type === "undirect") {
      this.setCell(dst, src, weight);
    }
  }

  updateAllArcsWeight(update: ArcWeightUpdate<N>): void {
    const size = this.nodeCount();
    for (let src = 0; src < size; src += 1) {
      for (let dst = 0; dst < size; dst += 1) {
        const cell = src * size + dst;
        if (this.presence[cell] === 0) {
          continue;
        }
        if (this.type === "direct") {
          this.arcWeights[cell] = update(src, dst, this.arcWeights[cell]);
          continue;
        }
        if (dst < src) {
          continue;
        }
        const next = update(src, dst, this.arcWeights[cell]);
        this.arcWeights[cell] = next;
        this.arcWeights[dst * size + src] = next;
      }
    }
  }

  updateAllNodesWeight(update: NodeWeightUpdate<N>): void {
    for (let index = 0; index < this.weights.length; index += 1) {
      this.weights[index] = update(index, this.weights[index]);
    }
  }

  assignNodeWeights(weights: Iterable<N>): void {
    let index = 0;
    for (const weight of weights) {
      if (index >= this.weights.length) {
        break;
      }
      this.weights[index] = weight;
      index += 1;
    }
  }

  assignIndexedNodeWeights(entries: Iterable<readonly [number, N]>): void {
    for (const [index, weight] of entries) {
      assertNodeIndex(index, this.nodeCount());
      this.weights[index] = weight;
    }
  }

  nodeWeight(index: number): N {
    assertNodeIndex(index, this.nodeCount());
    return this.weights[index];
  }

  visitNodes(visit: NodeVisitor<N>): void {
    this.weights.forEach((weight, index) => visit(index, weight));
  }

  /** Row-major over set cells. */
  visitArcs(visit: ArcVisitor<N>): void {
    for (const arc of this.arcs()) {
      visit(arc.src, arc.dst, arc.weight);
    }
  }

  *nodes(): IterableIterator<[number, N]> {
    for (let index = 0; index < this.weights.length; index += 1) {
      yield [index, this.weights[index]];
    }
  }

  *arcs(): IterableIterator<Arc<N>> {
    const size = this.nodeCount();
    for (let src = 0; src < size; src += 1) {
      for (let dst = 0; dst < size; dst += 1) {
        const cell = src * size + dst;
        if (this.presence[cell] === 1) {
          yield { src, dst, weight: this.arcWeights[cell] };
        }
      }
    }
  }

  /** Outgoing arcs of `node` by ascending destination. */
  successors(node: number): Arc<N>[] {
    assertNodeIndex(node, this.nodeCount());
    const size = this.nodeCount();
    const result: Arc<N>[] = [];
    for (let dst = 0; dst < size; dst += 1) {
      const cell = node * size + dst;
      if (this.presence[cell] === 1) {
        result.push({ src: node, dst, weight: this.arcWeights[cell] });
      }
    }
    return result;
  }

  hasArc(src: number, dst: number): boolean {
    return this.presence[this.cellOf(src, dst)] === 1;
  }

  cost(src: number, dst: number): N {
    const cell = this.cellOf(src, dst);
    if (this.presence[cell] === 0) {
      throw new MissingArcError(src, dst);
    }
    return this.arcWeights[cell];
  }

  private cellOf(src: number, dst: number): number {
    assertNodeIndex(src, this.nodeCount(), "source");
    assertNodeIndex(dst, this.nodeCount(), "destination");
    return src * this.nodeCount() + dst;
  }

  private setCell(src: number, dst: number, weight: N): void {
    const cell = src * this.nodeCount() + dst;
    if (this.presence[cell] === 1) {
      return;
    }
    this.presence[cell] = 1;
    this.arcWeights[cell] = weight;
    this.storedArcs += 1;
  }
}
