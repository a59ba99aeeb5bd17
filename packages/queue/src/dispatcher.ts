import type { JobsOptions } from "bullmq";
import type { BackfillJobData, DeleteJobData, IIngestionDispatcher, IngestJobData } from "@docsift/types";

/** The part of a BullMQ queue the producers use. */
export interface JobQueue<T> {
  add(name: string, data: T, opts?: JobsOptions): Promise<unknown>;
}

/**
 * Hands async ingestion to the worker app. The job record id doubles as the
 * BullMQ job id so a repeated dispatch of the same job is ignored.
 */
export class BullmqIngestionDispatcher implements IIngestionDispatcher {
  private readonly queue: JobQueue<IngestJobData>;

  constructor(queue: JobQueue<IngestJobData>) {
    this.queue = queue;
  }

  async dispatch(data: IngestJobData): Promise<void> {
    await this.queue.add("ingest", data, { jobId: data.jobId });
  }
}

export async function enqueueBackfill(queue: JobQueue<BackfillJobData>, data: BackfillJobData): Promise<void> {
  await queue.add("backfill", data);
}

export async function enqueueDelete(queue: JobQueue<DeleteJobData>, data: DeleteJobData): Promise<void> {
  await queue.add("delete", data, { jobId: `delete:${data.tenant}:${data.documentId}` });
}
