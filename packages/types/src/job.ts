import type { IngestionOptions, IngestionOutcome, SerializableSource } from "./ingestion.js";

export type IngestionJobStatus = "queued" | "processing" | "completed" | "failed";

export const TERMINAL_JOB_STATUSES: readonly IngestionJobStatus[] = ["completed", "failed"];

export interface IngestionJob {
  id: string;
  tenant: string;
  status: IngestionJobStatus;
  progress: number;
  result: IngestionOutcome | null;
  error: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface JobUpdate {
  status?: IngestionJobStatus;
  progress?: number;
  result?: IngestionOutcome;
  error?: string;
}

export type JobType = "ingest" | "backfill" | "delete";

export interface JobData {
  tenant: string;
  type: JobType;
}

export interface IngestJobData extends JobData {
  type: "ingest";
  jobId: string;
  source: SerializableSource;
  options: IngestionOptions;
}

export interface BackfillJobData extends JobData {
  type: "backfill";
  documentId?: string;
  batchSize: number;
}

export interface DeleteJobData extends JobData {
  type: "delete";
  documentId: string;
}

export type AnyJobData = IngestJobData | BackfillJobData | DeleteJobData;

/**
 * Hands an accepted ingestion job to whatever runs it in the background.
 * The job record is the only synchronization point with the caller.
 */
export interface IIngestionDispatcher {
  dispatch(data: IngestJobData): Promise<void>;
}
