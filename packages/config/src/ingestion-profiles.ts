import type { IngestionOptions, IngestionProfile, IngestionProfileName } from "@docsift/types";

/**
 * - **standard**: embeds, structure-aware chunking, dedup
 * - **fast**: same chunks, no embeddings (backfill later)
 * - **degraded**: the retry set after a failed attempt; plain small windows, nothing optional
 */
export const INGESTION_PROFILES: Readonly<Record<IngestionProfileName, IngestionProfile>> = {
  standard: {
    name: "standard",
    embed: true,
    structureAware: true,
    dedup: true,
    storeFile: true,
    suggestQuestions: true,
  },
  fast: {
    name: "fast",
    embed: false,
    structureAware: true,
    dedup: true,
    storeFile: true,
    suggestQuestions: true,
  },
  degraded: {
    name: "degraded",
    chunkSize: 500,
    overlap: 50,
    embed: false,
    structureAware: false,
    dedup: false,
    storeFile: true,
    suggestQuestions: false,
  },
};

/**
 * Merge per-request options over a named profile. `fastMode` only ever
 * turns embedding off.
 */
export function resolveIngestionProfile(
  name: IngestionProfileName = "standard",
  overrides: IngestionOptions = {},
): IngestionProfile {
  const base = INGESTION_PROFILES[name];

  return {
    ...base,
    chunkSize: overrides.chunkSize ?? base.chunkSize,
    overlap: overrides.overlap ?? base.overlap,
    embed: base.embed && overrides.fastMode !== true,
    structureAware: overrides.structureAware ?? base.structureAware,
    dedup: overrides.dedup ?? base.dedup,
    storeFile: overrides.storeFile ?? base.storeFile,
    suggestQuestions: overrides.suggestQuestions ?? base.suggestQuestions,
  };
}
