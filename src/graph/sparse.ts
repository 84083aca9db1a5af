import { ERROR_CODES } from "../types.js";
import { numberWeights, type WeightAlgebra } from "../weights.js";
import { assertNodeCount, assertNodeIndex } from "./bounds.js";
import { GraphError, MissingArcError } from "./errors.js";
import type {
  Arc,
  ArcVisitor,
  ArcWeightUpdate,
  GraphType,
  NodeVisitor,
  NodeWeightUpdate,
  WeightedGraph,
} from "./types.js";

interface AdjacencyEntry<N> {
  readonly dst: number;
  weight: N;
}

/**
 * Adjacency-list backend. Every source node owns an insertion-ordered list of
 * outgoing entries; insertion never checks for an existing arc, so repeated
 * `addArc(u, v, ...)` calls keep parallel entries and each one is counted.
 *
 * An undirected self-loop is its own mirror and is stored once, unlike a
 * plain mirror push that would append `(v, v)` twice.
 */
export class SparseGraph<N> implements WeightedGraph<N> {
  private readonly weights: N[];
  private readonly adjacency: AdjacencyEntry<N>[][];
  private storedArcs = 0;

  constructor(
    nodeCount: number,
    readonly type: GraphType,
    readonly algebra: WeightAlgebra<N>,
  ) {
    assertNodeCount(nodeCount);
    this.weights = Array.from({ length: nodeCount }, () => algebra.zero());
    this.adjacency = Array.from({ length: nodeCount }, () => []);
  }

  /** Directed graph with `number` weights. */
  static direct(nodeCount: number): SparseGraph<number> {
    return new SparseGraph(nodeCount, "direct", numberWeights);
  }

  /** Undirected graph with `number` weights. */
  static undirect(nodeCount: number): SparseGraph<number> {
    return new SparseGraph(nodeCount, "undirect", numberWeights);
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
    this.append(src, dst, weight);
    if (this.type === "undirect" && src !== dst) {
      this.append(dst, src, weight);
    }
  }

  updateAllArcsWeight(update: ArcWeightUpdate<N>): void {
    this.adjacency.forEach((entries, src) => {
      // Occurrence counters pair the k-th `src -> dst` entry with the k-th
      // `dst -> src` entry, which were appended by the same insertion.
      const occurrences = new Map<number, number>();
      for (const entry of entries) {
        const occurrence = occurrences.get(entry.dst) ?? 0;
        occurrences.set(entry.dst, occurrence + 1);
        if (this.type === "direct") {
          entry.weight = update(src, entry.dst, entry.weight);
          continue;
        }
        if (entry.dst < src) {
          continue;
        }
        entry.weight = update(src, entry.dst, entry.weight);
        if (entry.dst !== src) {
          this.mirrorOf(entry.dst, src, occurrence).weight = entry.weight;
        }
      }
    });
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

  visitArcs(visit: ArcVisitor<N>): void {
    this.adjacency.forEach((entries, src) => {
      for (const entry of entries) {
        visit(src, entry.dst, entry.weight);
      }
    });
  }

  *nodes(): IterableIterator<[number, N]> {
    for (let index = 0; index < this.weights.length; index += 1) {
      yield [index, this.weights[index]];
    }
  }

  *arcs(): IterableIterator<Arc<N>> {
    for (let src = 0; src < this.adjacency.length; src += 1) {
      for (const entry of this.adjacency[src]) {
        yield { src, dst: entry.dst, weight: entry.weight };
      }
    }
  }

  /** Outgoing arcs of `node` in insertion order, duplicates included. */
  successors(node: number): Arc<N>[] {
    assertNodeIndex(node, this.nodeCount());
    return this.adjacency[node].map((entry) => ({ src: node, dst: entry.dst, weight: entry.weight }));
  }

  hasArc(src: number, dst: number): boolean {
    assertNodeIndex(src, this.nodeCount(), "source");
    assertNodeIndex(dst, this.nodeCount(), "destination");
    return this.adjacency[src].some((entry) => entry.dst === dst);
  }

  /** Scans the source list; with duplicates the first inserted entry wins. */
  cost(src: number, dst: number): N {
    assertNodeIndex(src, this.nodeCount(), "source");
    assertNodeIndex(dst, this.nodeCount(), "destination");
    const entry = this.adjacency[src].find((candidate) => candidate.dst === dst);
    if (!entry) {
      throw new MissingArcError(src, dst);
    }
    return entry.weight;
  }

  private append(src: number, dst: number, weight: N): void {
    this.adjacency[src].push({ dst, weight });
    this.storedArcs += 1;
  }

  private mirrorOf(owner: number, dst: number, occurrence: number): AdjacencyEntry<N> {
    let seen = 0;
    for (const entry of this.adjacency[owner]) {
      if (entry.dst !== dst) {
        continue;
      }
      if (seen === occurrence) {
        return entry;
      }
      seen += 1;
    }
    throw new GraphError(
      ERROR_CODES.GRAPH_INVALID_INPUT,
      `undirected arc ${dst} -> ${owner} has no stored mirror`,
      { src: dst, dst: owner, occurrence },
    );
  }
}
