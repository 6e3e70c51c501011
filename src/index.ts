export * from "./types.js";
export * from "./logger.js";
export * from "./config/digraphConfig.js";
export * from "./graph/types.js";
export * from "./graph/errors.js";
export * from "./graph/digraph.js";
export * from "./graph/refDigraph.js";
