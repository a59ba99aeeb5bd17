import type { AnyJobData } from "@docsift/types";
import type { DocumentService, EmbeddingBackfill, IngestionJobService } from "@docsift/core";
import type { Logger } from "@docsift/logger";
import { processIngest } from "./ingest.js";
import { processBackfill } from "./backfill.js";
import { processDelete } from "./delete.js";

export interface ProcessorServices {
  jobs: Pick<IngestionJobService, "run">;
  backfill: Pick<EmbeddingBackfill, "run">;
  documents: Pick<DocumentService, "deleteDocument">;
  logger: Logger;
}

export function processJob(services: ProcessorServices, data: AnyJobData): Promise<unknown> {
  switch (data.type) {
    case "ingest":
      return processIngest(services, data);
    case "backfill":
      return processBackfill(services, data);
    case "delete":
      return processDelete(services, data);
  }
}

export { processIngest, processBackfill, processDelete };
