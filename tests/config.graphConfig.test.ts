import { afterEach, describe, it } from "mocha";
import { expect } from "chai";

import { readEnum, readInt, readOptionalInt } from "../src/config/env.js";
import { DEFAULT_MAX_DECODE_NODES, DEFAULT_MAX_DENSE_CELLS, loadGraphConfig } from "../src/config/graphConfig.js";

const VARIABLES = [
  "WEIGHTGRAPH_LOG_LEVEL",
  "WEIGHTGRAPH_MAX_DECODE_NODES",
  "WEIGHTGRAPH_MAX_DENSE_CELLS",
  "WEIGHTGRAPH_TEST_VALUE",
] as const;

describe("graph configuration", () => {
  const snapshot = new Map(VARIABLES.map((name) => [name, process.env[name]] as const));

  afterEach(() => {
    for (const [name, value] of snapshot) {
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
  });

  it("falls back to defaults when unset", () => {
    delete process.env.WEIGHTGRAPH_LOG_LEVEL;
    delete process.env.WEIGHTGRAPH_MAX_DECODE_NODES;
    delete process.env.WEIGHTGRAPH_MAX_DENSE_CELLS;

    expect(loadGraphConfig()).to.deep.equal({
      logLevel: "info",
      maxDecodeNodes: DEFAULT_MAX_DECODE_NODES,
      maxDenseCells: DEFAULT_MAX_DENSE_CELLS,
    });
  });

  it("reads overrides case-insensitively", () => {
    process.env.WEIGHTGRAPH_LOG_LEVEL = " DEBUG ";
    process.env.WEIGHTGRAPH_MAX_DECODE_NODES = "250";
    process.env.WEIGHTGRAPH_MAX_DENSE_CELLS = "64";

    expect(loadGraphConfig()).to.deep.equal({ logLevel: "debug", maxDecodeNodes: 250, maxDenseCells: 64 });
  });

  it("ignores invalid literals", () => {
    process.env.WEIGHTGRAPH_LOG_LEVEL = "verbose";
    process.env.WEIGHTGRAPH_MAX_DECODE_NODES = "0";
    process.env.WEIGHTGRAPH_MAX_DENSE_CELLS = "-4";

    expect(loadGraphConfig()).to.deep.equal({
      logLevel: "info",
      maxDecodeNodes: DEFAULT_MAX_DECODE_NODES,
      maxDenseCells: DEFAULT_MAX_DENSE_CELLS,
    });
  });

  it("parses integers strictly", () => {
    process.env.WEIGHTGRAPH_TEST_VALUE = "12abc";
    expect(readOptionalInt("WEIGHTGRAPH_TEST_VALUE")).to.equal(undefined);

    process.env.WEIGHTGRAPH_TEST_VALUE = "+42";
    expect(readInt("WEIGHTGRAPH_TEST_VALUE", 0, { max: 40 })).to.equal(0);
    expect(readInt("WEIGHTGRAPH_TEST_VALUE", 0)).to.equal(42);

    process.env.WEIGHTGRAPH_TEST_VALUE = "sparse";
    expect(readEnum("WEIGHTGRAPH_TEST_VALUE", ["sparse", "dense"], "dense")).to.equal("sparse");
  });
});
