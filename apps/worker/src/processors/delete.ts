import type { DeleteJobData } from "@docsift/types";
import { NotFoundError } from "@docsift/errors";
import type { DeletionReport } from "@docsift/core";
import type { ProcessorServices } from "./index.js";

/**
 * Cascading delete: chunks with the document, then the stored original and
 * cached vectors. A document that is already gone counts as done.
 */
export async function processDelete(services: ProcessorServices, data: DeleteJobData): Promise<DeletionReport | null> {
  try {
    return await services.documents.deleteDocument(data.tenant, data.documentId);
  } catch (err) {
    if (err instanceof NotFoundError) {
      services.logger.info({ queue: "delete", tenant: data.tenant, documentId: data.documentId }, "already deleted");
      return null;
    }
    throw err;
  }
}
