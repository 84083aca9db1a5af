import { z } from "zod";

/** Scalar a weight is written as inside a JSON payload. */
export type JsonWeight = number | string;

/**
 * Operations a weight type must support to be stored in a graph. Only the
 * additive structure is required: cost accumulation never multiplies.
 */
export interface WeightAlgebra<N> {
  /** Short identifier surfaced in logs. */
  readonly name: string;
  /** Additive identity, also the initial weight of every node. */
  zero(): N;
  add(left: N, right: N): N;
  equals(left: N, right: N): boolean;
  isZero(value: N): boolean;
  /** Schema validating the JSON form of a weight and producing the runtime value. */
  readonly schema: z.ZodType<N, z.ZodTypeDef, unknown>;
  toJson(value: N): JsonWeight;
  /** Text used by renderers such as {@link toDotSource}. */
  format(value: N): string;
}

/**
 * Finite double-precision weights. `-0` counts as zero. Graph operations do
 * not check finiteness; `NaN` and infinities are refused when encoding.
 */
export const numberWeights: WeightAlgebra<number> = {
  name: "number",
  zero: () => 0,
  add: (left, right) => left + right,
  equals: (left, right) => left === right,
  isZero: (value) => value === 0,
  schema: z.number().finite(),
  toJson: (value) => value,
  format: (value) => String(value),
};

/** Integer weights restricted to the safe integer range. */
export const integerWeights: WeightAlgebra<number> = {
  ...numberWeights,
  name: "integer",
  add: (left, right) => {
    const sum = left + right;
    if (!Number.isSafeInteger(sum)) {
      throw new RangeError(`integer weight overflow: ${left} + ${right}`);
    }
    return sum;
  },
  schema: z
    .number()
    .int()
    .refine((value) => Number.isSafeInteger(value), { message: "weight exceeds the safe integer range" }),
};

const BIGINT_LITERAL = /^-?\d+$/;

/**
 * Arbitrary precision integer weights. JSON cannot carry bigint values so they
 * travel as decimal strings; plain safe integers are accepted on input too.
 */
export const bigintWeights: WeightAlgebra<bigint> = {
  name: "bigint",
  zero: () => 0n,
  add: (left, right) => left + right,
  equals: (left, right) => left === right,
  isZero: (value) => value === 0n,
  schema: z
    .union([
      z.string().regex(BIGINT_LITERAL, { message: "expected a decimal integer literal" }),
      z.number().int().refine((value) => Number.isSafeInteger(value), {
        message: "numeric literal exceeds the safe integer range",
      }),
    ])
    .transform((value) => BigInt(value)),
  toJson: (value) => value.toString(),
  format: (value) => value.toString(),
};

/** Counts the weights equal to the additive identity. */
export function countZeros<N>(weights: Iterable<N>, algebra: WeightAlgebra<N>): number {
  let zeros = 0;
  for (const weight of weights) {
    if (algebra.isZero(weight)) {
      zeros += 1;
    }
  }
  return zeros;
}
