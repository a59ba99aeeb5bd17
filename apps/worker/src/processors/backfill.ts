import type { BackfillJobData } from "@docsift/types";
import { ExternalServiceError } from "@docsift/errors";
import type { BackfillReport } from "@docsift/core";
import type { ProcessorServices } from "./index.js";

/**
 * Embeds chunks stored without vectors. An interrupted run throws so the
 * queue retries it with backoff; the batches already written stay.
 */
export async function processBackfill(services: ProcessorServices, data: BackfillJobData): Promise<BackfillReport> {
  const report = await services.backfill.run(data.tenant, {
    batchSize: data.batchSize,
    ...(data.documentId !== undefined ? { documentId: data.documentId } : {}),
  });

  services.logger.info({ queue: "backfill", tenant: data.tenant, ...report }, "backfill job finished");
  if (report.interrupted) {
    throw new ExternalServiceError(
      `Backfill interrupted after ${String(report.embedded)} chunks: ${report.error ?? "unknown error"}`,
      "embeddings",
    );
  }
  return report;
}
