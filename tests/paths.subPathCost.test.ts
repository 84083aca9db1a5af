import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { backendFor, type BackendName } from "../src/graph/backends.js";
import { MissingArcError } from "../src/graph/errors.js";
import { SparseGraph } from "../src/graph/sparse.js";
import { consecutivePairs, SubPathCostIterator, subPathCosts } from "../src/paths/subPathCost.js";
import { bigintWeights, numberWeights } from "../src/weights.js";

describe("sub-path costs", () => {
  for (const name of ["sparse", "dense"] as const satisfies readonly BackendName[]) {
    it(`accumulates every sub-walk on the ${name} backend`, () => {
      const graph = backendFor<number>(name)(4, "direct", numberWeights);
      graph.addArc(0, 1, 1);
      graph.addArc(1, 2, 2);
      graph.addArc(2, 3, 3);
      graph.addArc(3, 0, 4);

      expect([...subPathCosts(graph, [0, 1, 2, 3])]).to.deep.equal([
        { src: 0, dst: 1, cost: 1 },
        { src: 0, dst: 2, cost: 3 },
        { src: 0, dst: 3, cost: 6 },
        { src: 1, dst: 2, cost: 2 },
        { src: 1, dst: 3, cost: 5 },
        { src: 2, dst: 3, cost: 3 },
      ]);
    });
  }

  it("yields nothing for walks shorter than two nodes", () => {
    const graph = SparseGraph.direct(1);
    expect([...subPathCosts(graph, [])]).to.deep.equal([]);
    expect([...subPathCosts(graph, [0])]).to.deep.equal([]);
  });

  it("reports node identifiers rather than offsets", () => {
    const graph = SparseGraph.direct(4);
    graph.addArc(3, 1, 4);
    graph.addArc(1, 2, 1);

    expect([...subPathCosts(graph, [3, 1, 2])]).to.deep.equal([
      { src: 3, dst: 1, cost: 4 },
      { src: 3, dst: 2, cost: 5 },
      { src: 1, dst: 2, cost: 1 },
    ]);
  });

  it("looks arcs up lazily, one per step", () => {
    const cost = sinon.stub<[number, number], number>().returns(1);
    const iterator = new SubPathCostIterator({ cost }, [0, 1, 2, 3, 4], numberWeights);

    expect(cost.callCount).to.equal(0);
    expect(iterator.next()).to.deep.equal({ done: false, value: { src: 0, dst: 1, cost: 1 } });
    expect(cost.callCount).to.equal(1);
    expect(iterator.next()).to.deep.equal({ done: false, value: { src: 0, dst: 2, cost: 2 } });
    expect(cost.args).to.deep.equal([
      [0, 1],
      [1, 2],
    ]);

    expect([...iterator]).to.have.length(8);
    expect(cost.callCount).to.equal(10);
    expect(iterator.next()).to.deep.equal({ done: true, value: undefined });
  });

  it("propagates missing arcs and stops", () => {
    const graph = SparseGraph.direct(3);
    graph.addArc(0, 1, 1);
    const iterator = subPathCosts(graph, [0, 1, 2]);

    expect(iterator.next().value).to.deep.equal({ src: 0, dst: 1, cost: 1 });
    expect(() => iterator.next()).to.throw(MissingArcError, "no arc stored from 1 to 2");
    expect(iterator.next()).to.deep.equal({ done: true, value: undefined });
  });

  it("uses the first of duplicate sparse arcs", () => {
    const graph = SparseGraph.direct(2);
    graph.addArc(0, 1, 2);
    graph.addArc(0, 1, 9);

    expect([...subPathCosts(graph, [0, 1])]).to.deep.equal([{ src: 0, dst: 1, cost: 2 }]);
  });

  it("accumulates bigint weights", () => {
    const graph = new SparseGraph(3, "undirect", bigintWeights);
    graph.addArc(0, 1, 9007199254740993n);
    graph.addArc(1, 2, 1n);

    expect([...subPathCosts(graph, [2, 1, 0])].map((entry) => entry.cost)).to.deep.equal([
      1n,
      9007199254740994n,
      9007199254740993n,
    ]);
  });
});

describe("consecutivePairs", () => {
  it("pairs each node with its successor", () => {
    expect([...consecutivePairs([1, 2, 3, 4, 5, 6])]).to.deep.equal([
      [1, 2],
      [2, 3],
      [3, 4],
      [4, 5],
      [5, 6],
    ]);
    expect([...consecutivePairs([7])]).to.deep.equal([]);
    expect([...consecutivePairs([])]).to.deep.equal([]);
  });
});
