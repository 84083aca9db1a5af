import type { GraphVisitor } from "./types.js";

/** Set of `src->dst=weight` keys, duplicates collapsed. */
export function directedArcSet<N>(graph: GraphVisitor<N>): Set<string> {
  const keys = new Set<string>();
  graph.visitArcs((src, dst, weight) => {
    keys.add(`${src}->${dst}=${graph.algebra.format(weight)}`);
  });
  return keys;
}

/**
 * True when both graphs share type, node count, node weights and the set of
 * directed arcs. Duplicate multiplicity is ignored, so a sparse graph holding
 * parallel entries still matches its dense counterpart.
 */
export function graphsEquivalent<N>(left: GraphVisitor<N>, right: GraphVisitor<N>): boolean {
  if (left.type !== right.type || left.nodeCount() !== right.nodeCount()) {
    return false;
  }

  const leftWeights: N[] = [];
  left.visitNodes((_, weight) => leftWeights.push(weight));
  let nodesMatch = true;
  right.visitNodes((index, weight) => {
    if (!left.algebra.equals(leftWeights[index], weight)) {
      nodesMatch = false;
    }
  });
  if (!nodesMatch) {
    return false;
  }

  const leftArcs = directedArcSet(left);
  const rightArcs = directedArcSet(right);
  if (leftArcs.size !== rightArcs.size) {
    return false;
  }
  for (const key of leftArcs) {
    if (!rightArcs.has(key)) {
      return false;
    }
  }
  return true;
}
