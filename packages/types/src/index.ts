export * from "./document.js";
export * from "./chunk.js";
export * from "./pipeline.js";
export * from "./job.js";
export * from "./query.js";
export * from "./reindex.js";
export * from "./storage.js";
export * from "./config.js";
