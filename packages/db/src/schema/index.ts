export * from "./documents.js";
export * from "./chunks.js";
export * from "./chunk-vectors.js";
