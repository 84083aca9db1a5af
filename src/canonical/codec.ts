/**
 * JSON wire format of {@link CanonicalForm}. Tagged unions are written the
 * externally tagged way (`{ "Extended": [...] }`, `{ "Weighted": [...] }`)
 * and graph types as `"Direct"` / `"Undirect"`, so payloads stay compatible
 * with other producers of the same record.
 */
import { z } from "zod";

import { loadGraphConfig } from "../config/graphConfig.js";
import type { GraphFactory } from "../graph/backends.js";
import { CanonicalDecodeError, CanonicalEncodeError, type CanonicalDecodeIssue } from "../graph/errors.js";
import type { GraphType, GraphVisitor, WeightedGraph } from "../graph/types.js";
import type { StructuredLogger } from "../logger.js";
import type { JsonWeight, WeightAlgebra } from "../weights.js";
import {
  fromCanonical,
  toCanonical,
  validateCanonical,
  type CanonicalArcs,
  type CanonicalForm,
  type CanonicalNodes,
  type ToCanonicalOptions,
} from "./form.js";

export type WireGraphType = "Direct" | "Undirect";

export type WireNodes =
  | { Extended: JsonWeight[] }
  | { Compact: { count: number; weights: Array<[number, JsonWeight]> } };

export type WireArcs = { Simple: Array<[number, number]> } | { Weighted: Array<[number, number, JsonWeight]> };

/** Serialized graph record. */
export interface WireGraph {
  gtype: WireGraphType;
  nodes: WireNodes;
  arcs: WireArcs;
}

const IndexSchema = z.number().int().nonnegative();

/**
 * Structural schema. Weights stay opaque here and are decoded afterwards by
 * the caller's {@link WeightAlgebra}, which keeps this schema independent of
 * the weight type.
 */
const WireGraphSchema = z
  .object({
    gtype: z.enum(["Direct", "Undirect"]),
    nodes: z.union([
      z.object({ Extended: z.array(z.unknown()) }).strict(),
      z
        .object({
          Compact: z.object({ count: IndexSchema, weights: z.array(z.tuple([IndexSchema, z.unknown()])) }).strict(),
        })
        .strict(),
    ]),
    arcs: z.union([
      z.object({ Simple: z.array(z.tuple([IndexSchema, IndexSchema])) }).strict(),
      z.object({ Weighted: z.array(z.tuple([IndexSchema, IndexSchema, z.unknown()])) }).strict(),
    ]),
  })
  .strict();

const TO_WIRE_TYPE: Record<GraphType, WireGraphType> = { direct: "Direct", undirect: "Undirect" };
const FROM_WIRE_TYPE: Record<WireGraphType, GraphType> = { Direct: "direct", Undirect: "undirect" };

/**
 * Converts a form to its wire record. Every weight must survive the
 * algebra's own decoder; otherwise {@link CanonicalEncodeError} lists them.
 */
export function encodeCanonical<N>(form: CanonicalForm<N>, algebra: WeightAlgebra<N>): WireGraph {
  const issues: CanonicalDecodeIssue[] = [];
  const encodeWeight = (weight: N, path: string): JsonWeight => {
    const json = algebra.toJson(weight);
    const checked = algebra.schema.safeParse(json);
    if (!checked.success) {
      for (const issue of checked.error.issues) {
        issues.push({ path: `${path}${toPointer(issue.path)}`, message: issue.message });
      }
    }
    return json;
  };

  const wire: WireGraph = {
    gtype: TO_WIRE_TYPE[form.type],
    nodes: encodeNodes(form.nodes, encodeWeight),
    arcs: encodeArcs(form.arcs, encodeWeight),
  };
  if (issues.length > 0) {
    throw new CanonicalEncodeError(issues);
  }
  return wire;
}

type WeightEncoder<N> = (weight: N, path: string) => JsonWeight;

function encodeNodes<N>(nodes: CanonicalNodes<N>, encodeWeight: WeightEncoder<N>): WireNodes {
  if (nodes.kind === "extended") {
    return { Extended: nodes.weights.map((weight, index) => encodeWeight(weight, `/nodes/Extended/${index}`)) };
  }
  return {
    Compact: {
      count: nodes.count,
      weights: nodes.weights.map(([index, weight], position): [number, JsonWeight] => [
        index,
        encodeWeight(weight, `/nodes/Compact/weights/${position}/1`),
      ]),
    },
  };
}

function encodeArcs<N>(arcs: CanonicalArcs<N>, encodeWeight: WeightEncoder<N>): WireArcs {
  if (arcs.kind === "simple") {
    return { Simple: arcs.pairs.map(([src, dst]): [number, number] => [src, dst]) };
  }
  return {
    Weighted: arcs.triples.map(([src, dst, weight], position): [number, number, JsonWeight] => [
      src,
      dst,
      encodeWeight(weight, `/arcs/Weighted/${position}/2`),
    ]),
  };
}

export interface DecodeOptions {
  /** Overrides `WEIGHTGRAPH_MAX_DECODE_NODES`. */
  readonly maxNodes?: number;
  readonly logger?: StructuredLogger;
}

/**
 * Validates an untrusted payload and returns the canonical form it describes.
 * Every structural, weight and index issue is collected before
 * {@link CanonicalDecodeError} is thrown.
 */
export function decodeCanonical<N>(
  payload: unknown,
  algebra: WeightAlgebra<N>,
  options: DecodeOptions = {},
): CanonicalForm<N> {
  const structural = WireGraphSchema.safeParse(payload);
  if (!structural.success) {
    reject(
      structural.error.issues.map((issue) => ({ path: toPointer(issue.path), message: issue.message })),
      options.logger,
    );
  }
  const wire = structural.data;

  const issues: CanonicalDecodeIssue[] = [];
  const decodeWeight = (raw: unknown, path: string): N => {
    const parsed = algebra.schema.safeParse(raw);
    if (parsed.success) {
      return parsed.data;
    }
    for (const issue of parsed.error.issues) {
      issues.push({ path: `${path}${toPointer(issue.path)}`, message: issue.message });
    }
    return algebra.zero();
  };

  let nodes: CanonicalNodes<N>;
  if ("Extended" in wire.nodes) {
    nodes = {
      kind: "extended",
      weights: wire.nodes.Extended.map((raw, index) => decodeWeight(raw, `/nodes/Extended/${index}`)),
    };
  } else {
    nodes = {
      kind: "compact",
      count: wire.nodes.Compact.count,
      weights: wire.nodes.Compact.weights.map(
        ([index, raw], position) => [index, decodeWeight(raw, `/nodes/Compact/weights/${position}/1`)] as const,
      ),
    };
  }

  let arcs: CanonicalArcs<N>;
  if ("Simple" in wire.arcs) {
    arcs = { kind: "simple", pairs: wire.arcs.Simple };
  } else {
    arcs = {
      kind: "weighted",
      triples: wire.arcs.Weighted.map(
        ([src, dst, raw], position) => [src, dst, decodeWeight(raw, `/arcs/Weighted/${position}/2`)] as const,
      ),
    };
  }

  const form: CanonicalForm<N> = { type: FROM_WIRE_TYPE[wire.gtype], nodes, arcs };
  issues.push(...validateCanonical(form, { maxNodes: options.maxNodes ?? loadGraphConfig().maxDecodeNodes }));
  if (issues.length > 0) {
    reject(issues, options.logger);
  }
  return form;
}

function reject(issues: CanonicalDecodeIssue[], logger: StructuredLogger | undefined): never {
  logger?.warn("canonical_decode_failed", { issues });
  throw new CanonicalDecodeError(issues);
}

function toPointer(path: ReadonlyArray<string | number>): string {
  return path.map((segment) => `/${String(segment)}`).join("");
}

/**
 * Encodes a graph as a JSON string of its {@link WireGraph}. Throws
 * {@link CanonicalEncodeError} when a weight could not be decoded again.
 */
export function serializeGraph<N>(graph: GraphVisitor<N>, options: ToCanonicalOptions = {}): string {
  return JSON.stringify(encodeCanonical(toCanonical(graph, options), graph.algebra));
}

/**
 * Parses a JSON string produced by {@link serializeGraph} (from either
 * backend) and materializes it with `backend`.
 */
export function deserializeGraph<N, G extends WeightedGraph<N>>(
  json: string,
  backend: GraphFactory<N, G>,
  algebra: WeightAlgebra<N>,
  options: DecodeOptions = {},
): G {
  let payload: unknown;
  try {
    payload = JSON.parse(json);
  } catch (error) {
    reject([{ path: "", message: error instanceof Error ? error.message : String(error) }], options.logger);
  }
  const form = decodeCanonical(payload, algebra, options);
  return fromCanonical(form, backend, algebra, { logger: options.logger });
}
