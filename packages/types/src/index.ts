export * from "./document.js";
export * from "./chunk.js";
export * from "./extraction.js";
export * from "./ingestion.js";
export * from "./job.js";
export * from "./search.js";
export * from "./answer.js";
export * from "./feedback.js";
export * from "./metrics.js";
export * from "./config.js";
export * from "./embedding.js";
