export * from "./types.js";
export * from "./weights.js";
export * from "./logger.js";
export * from "./config/env.js";
export * from "./config/graphConfig.js";
export * from "./graph/types.js";
export * from "./graph/errors.js";
export * from "./graph/bounds.js";
export * from "./graph/sparse.js";
export * from "./graph/dense.js";
export * from "./graph/backends.js";
export * from "./graph/compare.js";
export * from "./canonical/form.js";
export * from "./canonical/codec.js";
export * from "./paths/subPathCost.js";
export * from "./render/dot.js";
