import type { DocumentMetadata, DocumentSource } from "./document.js";

export type IngestionProfileName = "standard" | "fast" | "degraded";

export type IngestionSource =
  | { kind: "buffer"; data: Uint8Array; fileName: string; title?: string; source?: DocumentSource }
  | { kind: "file"; path: string; fileName: string; title?: string; source?: DocumentSource }
  | {
      kind: "text";
      text: string;
      title: string;
      source?: Extract<DocumentSource, "paste" | "video" | "batch">;
      metadata?: DocumentMetadata;
    }
  | { kind: "url"; url: string; title?: string };

/** Sources that can travel through a job queue (no raw bytes). */
export type SerializableSource = Exclude<IngestionSource, { kind: "buffer" }>;

export interface IngestionOptions {
  profile?: IngestionProfileName;
  chunkSize?: number;
  overlap?: number;
  /** Skip embeddings; chunks stay keyword-searchable until backfilled. */
  fastMode?: boolean;
  structureAware?: boolean;
  dedup?: boolean;
  storeFile?: boolean;
  suggestQuestions?: boolean;
}

/** Fully resolved option set used by one ingestion attempt. */
export interface IngestionProfile {
  name: IngestionProfileName;
  /** Undefined means the per-format default. */
  chunkSize?: number;
  overlap?: number;
  embed: boolean;
  structureAware: boolean;
  dedup: boolean;
  storeFile: boolean;
  suggestQuestions: boolean;
}

export type IngestionStage =
  | "received"
  | "validated"
  | "extracted"
  | "document_created"
  | "chunked_and_stored"
  | "embedded"
  | "done"
  | "rejected"
  | "failed"
  | "rolled_back";

export interface IngestionSuccess {
  success: true;
  documentId: string;
  chunksCreated: number;
  chunksEmbedded: number;
  /** True when the simplified retry option set produced the stored chunks. */
  degraded: boolean;
  /** True when standard chunking threw and the single emergency chunk was stored. */
  emergency: boolean;
  stages: IngestionStage[];
  warnings: string[];
}

export interface IngestionFailure {
  success: false;
  /** "none": no document row exists. "incomplete": a row exists (rollback itself failed). */
  documentState: "none" | "incomplete";
  documentId?: string;
  failedStage: "validation" | "extraction" | "processing";
  errorCode: string;
  error: string;
  retryError?: string;
  attempted: string[];
  stages: IngestionStage[];
}

export type IngestionOutcome = IngestionSuccess | IngestionFailure;

export interface BatchIngestionOutcome {
  succeeded: number;
  failed: number;
  results: IngestionOutcome[];
}
