import { describe, it } from "mocha";
import { expect } from "chai";
import * as fc from "fast-check";

import { backendFor, type BackendName } from "../src/graph/backends.js";
import { directedArcSet, graphsEquivalent } from "../src/graph/compare.js";
import { DenseGraph } from "../src/graph/dense.js";
import { SparseGraph } from "../src/graph/sparse.js";
import type { GraphType } from "../src/graph/types.js";
import { numberWeights } from "../src/weights.js";

const BACKEND_NAMES: readonly BackendName[] = ["sparse", "dense"];

for (const name of BACKEND_NAMES) {
  describe(`${name} backend contract`, () => {
    const create = backendFor<number>(name);

    it("allocates zero-weighted nodes and no arcs", () => {
      fc.assert(
        fc.property(fc.nat({ max: 40 }), fc.constantFrom<GraphType>("direct", "undirect"), (count, type) => {
          const graph = create(count, type, numberWeights);
          const weights: number[] = [];
          graph.visitNodes((_, weight) => weights.push(weight));

          expect(graph.nodeCount()).to.equal(count);
          expect(graph.arcCount()).to.equal(0);
          expect(graph.type).to.equal(type);
          expect(weights).to.deep.equal(new Array<number>(count).fill(0));
        }),
        { numRuns: 50 },
      );
    });

    it("exposes both directions of every undirected arc", () => {
      fc.assert(
        fc.property(
          fc.array(fc.tuple(fc.nat({ max: 5 }), fc.nat({ max: 5 }), fc.integer({ min: -9, max: 9 })), { maxLength: 12 }),
          (arcs) => {
            const graph = create(6, "undirect", numberWeights);
            // Dense keeps the first weight of a cell, so feed each pair once.
            const seen = new Set<string>();
            for (const [src, dst, weight] of arcs) {
              const key = `${Math.min(src, dst)}-${Math.max(src, dst)}`;
              if (!seen.has(key)) {
                seen.add(key);
                graph.addArc(src, dst, weight);
              }
            }

            const visited = directedArcSet(graph);
            for (const [src, dst] of arcs) {
              const weight = graph.cost(src, dst);
              expect(visited.has(`${src}->${dst}=${weight}`)).to.equal(true);
              expect(visited.has(`${dst}->${src}=${weight}`)).to.equal(true);
            }
          },
        ),
        { numRuns: 50 },
      );
    });

    it("reports node and arc entries together", () => {
      const graph = create(3, "direct", numberWeights);
      graph.addArc(0, 1, 1);
      graph.addArc(1, 2, 1);
      expect(graph.totalEntries()).to.equal(5);
    });
  });
}

describe("graph equivalence", () => {
  it("ignores duplicate multiplicity across backends", () => {
    const sparse = SparseGraph.undirect(3);
    sparse.addArc(0, 1, 2);
    sparse.addArc(0, 1, 2);
    const dense = DenseGraph.undirect(3);
    dense.addArc(1, 0, 2);

    expect(sparse.arcCount()).to.equal(4);
    expect(dense.arcCount()).to.equal(2);
    expect(graphsEquivalent(sparse, dense)).to.equal(true);
  });

  it("detects differing weights and types", () => {
    const left = SparseGraph.direct(2);
    left.addArc(0, 1, 1);
    const right = DenseGraph.direct(2);
    right.addArc(0, 1, 2);
    expect(graphsEquivalent(left, right)).to.equal(false);

    const nodes = SparseGraph.direct(2);
    nodes.addArc(0, 1, 1);
    nodes.updateAllNodesWeight((index) => index);
    expect(graphsEquivalent(left, nodes)).to.equal(false);

    expect(graphsEquivalent(SparseGraph.direct(2), SparseGraph.undirect(2))).to.equal(false);
  });
});
