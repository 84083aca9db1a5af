import { describe, it } from "mocha";
import { expect } from "chai";

import { bigintWeights, countZeros, integerWeights, numberWeights } from "../src/weights.js";

describe("weight algebras", () => {
  it("treats negative zero as the additive identity for numbers", () => {
    expect(numberWeights.zero()).to.equal(0);
    expect(numberWeights.isZero(-0)).to.equal(true);
    expect(numberWeights.add(1.5, 2.25)).to.equal(3.75);
  });

  it("rejects integer sums leaving the safe range", () => {
    expect(integerWeights.add(2, 3)).to.equal(5);
    expect(() => integerWeights.add(Number.MAX_SAFE_INTEGER, 1)).to.throw(RangeError);
    expect(integerWeights.schema.safeParse(1.5).success).to.equal(false);
  });

  it("decodes bigint weights from decimal strings and safe integers", () => {
    expect(bigintWeights.schema.parse("12345678901234567890")).to.equal(12345678901234567890n);
    expect(bigintWeights.schema.parse(7)).to.equal(7n);
    expect(bigintWeights.schema.safeParse("1.5").success).to.equal(false);
    expect(bigintWeights.toJson(10n)).to.equal("10");
  });

  it("counts zero weights", () => {
    expect(countZeros([0, 1, 0, 2, 0], numberWeights)).to.equal(3);
    expect(countZeros([1n, 0n], bigintWeights)).to.equal(1);
    expect(countZeros([], numberWeights)).to.equal(0);
  });
});
