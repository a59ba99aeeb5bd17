export * from "./documents.js";
export * from "./chunks.js";
export * from "./ingestion-jobs.js";
export * from "./feedback.js";
export * from "./metrics.js";
