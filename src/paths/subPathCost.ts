import type { ArcCost, WeightedGraph } from "../graph/types.js";
import type { WeightAlgebra } from "../weights.js";

/** Cumulative cost of the contiguous sub-walk from `src` to `dst`. */
export interface SubPathCost<N> {
  readonly src: number;
  readonly dst: number;
  readonly cost: N;
}

/**
 * Lazily enumerates the cost of every contiguous sub-walk of `path`: for each
 * start offset `s` and each end offset `e > s`, in that nesting order, the
 * sum of `cost(path[k], path[k + 1])` for `k` in `[s, e)`.
 *
 * Only the running total of the current start offset is kept, so a walk of
 * length `L` costs `L * (L - 1) / 2` lookups spread over the iteration. The
 * iterator is single-pass. When a lookup throws, the error propagates and
 * the iterator is exhausted.
 *
 * ```ts
 * const graph = DenseGraph.direct(4);
 * graph.addArc(0, 1, 1);
 * graph.addArc(1, 2, 2);
 * graph.addArc(2, 3, 3);
 * [...subPathCosts(graph, [0, 1, 2, 3])].map(({ cost }) => cost); // [1, 3, 6, 2, 5, 3]
 * ```
 */
export class SubPathCostIterator<N> implements IterableIterator<SubPathCost<N>> {
  private start = 0;
  private end = 0;
  private running: N;
  private exhausted: boolean;

  constructor(
    private readonly lookup: ArcCost<N>,
    private readonly path: readonly number[],
    private readonly algebra: WeightAlgebra<N>,
  ) {
    this.running = algebra.zero();
    this.exhausted = path.length < 2;
  }

  next(): IteratorResult<SubPathCost<N>, undefined> {
    if (this.exhausted) {
      return { done: true, value: undefined };
    }

    this.end += 1;
    if (this.end >= this.path.length) {
      this.start += 1;
      if (this.start >= this.path.length - 1) {
        this.exhausted = true;
        return { done: true, value: undefined };
      }
      this.end = this.start + 1;
      this.running = this.algebra.zero();
    }

    let step: N;
    try {
      step = this.lookup.cost(this.path[this.end - 1], this.path[this.end]);
    } catch (error) {
      this.exhausted = true;
      throw error;
    }
    this.running = this.algebra.add(this.running, step);
    return {
      done: false,
      value: { src: this.path[this.start], dst: this.path[this.end], cost: this.running },
    };
  }

  [Symbol.iterator](): IterableIterator<SubPathCost<N>> {
    return this;
  }
}

/** Sub-path costs of `path` over a graph, using the graph's own weight algebra. */
export function subPathCosts<N>(graph: WeightedGraph<N>, path: readonly number[]): SubPathCostIterator<N> {
  return new SubPathCostIterator(graph, path, graph.algebra);
}

/** Adjacent `[previous, current]` pairs of a walk. */
export function* consecutivePairs(path: Iterable<number>): Generator<[number, number], void, undefined> {
  let previous: number | undefined;
  for (const node of path) {
    if (previous !== undefined) {
      yield [previous, node];
    }
    previous = node;
  }
}
