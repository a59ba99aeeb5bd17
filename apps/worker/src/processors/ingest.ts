import type { IngestJobData, IngestionJob } from "@docsift/types";
import type { ProcessorServices } from "./index.js";

/**
 * Runs one accepted ingestion job. A failed outcome is written to the job
 * record and returned; only an unexpected throw reaches BullMQ.
 */
export async function processIngest(services: ProcessorServices, data: IngestJobData): Promise<IngestionJob> {
  const log = services.logger.child({ queue: "ingest", tenant: data.tenant, jobId: data.jobId });
  log.info({ source: data.source.kind, profile: data.options.profile }, "ingest job started");

  const job = await services.jobs.run(data);
  log.info({ status: job.status, progress: job.progress }, "ingest job finished");
  return job;
}
