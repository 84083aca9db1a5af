import { GraphIndexError, GraphInputError } from "./errors.js";

/** Validates the node count handed to a backend constructor. */
export function assertNodeCount(nodeCount: number): void {
  if (!Number.isSafeInteger(nodeCount) || nodeCount < 0) {
    throw new GraphInputError(`node count must be a non-negative integer, received ${nodeCount}`, { nodeCount });
  }
}

/** Rejects a dense matrix of `nodeCount * nodeCount` cells above `maxCells`. */
export function assertCellCount(nodeCount: number, maxCells: number): void {
  const cells = nodeCount * nodeCount;
  if (cells > maxCells) {
    throw new GraphInputError(
      `a dense graph of ${nodeCount} nodes needs ${cells} cells, above the limit of ${maxCells}`,
      { nodeCount, cells, maxCells },
    );
  }
}

/**
 * Throws {@link GraphIndexError} unless `index` addresses an existing node.
 * `role` names the argument in the message ("source", "destination", ...).
 */
export function assertNodeIndex(index: number, nodeCount: number, role = "node"): void {
  if (!Number.isInteger(index) || index < 0 || index >= nodeCount) {
    throw new GraphIndexError(index, nodeCount, role);
  }
}
