import type { ChunkEmbedding } from "@docsift/types";
import type { IDocumentStore } from "@docsift/db";
import type { IEmbeddingProvider } from "@docsift/embeddings";
import { ProcessingError, ValidationError, errorMessage } from "@docsift/errors";
import { createChildLogger, createSilentLogger, type Logger } from "@docsift/logger";

export const DEFAULT_BACKFILL_BATCH_SIZE = 64;

export interface BackfillOptions {
  documentId?: string;
  batchSize?: number;
  /** Stop after this many batches even if chunks are still missing vectors. */
  maxBatches?: number;
}

export interface BackfillReport {
  batches: number;
  embedded: number;
  /** True when the embedding model failed and the run stopped early. */
  interrupted: boolean;
  error?: string;
}

/**
 * Embeds chunks that were stored without a vector (fast mode, or an
 * embedding outage during ingestion), batch by batch.
 */
export class EmbeddingBackfill {
  private readonly documents: IDocumentStore;
  private readonly embeddings: IEmbeddingProvider;
  private readonly logger: Logger;

  constructor(documents: IDocumentStore, embeddings: IEmbeddingProvider, logger?: Logger) {
    this.documents = documents;
    this.embeddings = embeddings;
    this.logger = createChildLogger(logger ?? createSilentLogger(), { component: "embedding-backfill" });
  }

  async run(tenant: string, options: BackfillOptions = {}): Promise<BackfillReport> {
    const batchSize = options.batchSize ?? DEFAULT_BACKFILL_BATCH_SIZE;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new ValidationError("batchSize must be a positive integer", { batchSize: "invalid" });
    }

    const report: BackfillReport = { batches: 0, embedded: 0, interrupted: false };
    while (options.maxBatches === undefined || report.batches < options.maxBatches) {
      const pending = await this.documents.listChunksMissingEmbeddings(tenant, batchSize, options.documentId);
      if (pending.length === 0) break;

      let vectors: number[][];
      try {
        vectors = (await this.embeddings.batchEmbed(pending.map((chunk) => chunk.content), "document")).embeddings;
        if (vectors.length !== pending.length) {
          throw new ProcessingError(
            `Expected ${String(pending.length)} embeddings, got ${String(vectors.length)}`,
            "embedding",
          );
        }
      } catch (err) {
        // The same chunks would come back next round, so stop here.
        report.interrupted = true;
        report.error = errorMessage(err);
        this.logger.warn({ tenant, batch: report.batches, err: report.error }, "backfill interrupted");
        break;
      }

      const updates: ChunkEmbedding[] = pending.flatMap((chunk, i) => {
        const embedding = vectors[i];
        return embedding ? [{ chunkId: chunk.id, embedding }] : [];
      });
      report.embedded += await this.documents.setChunkEmbeddings(tenant, updates);
      report.batches++;

      if (pending.length < batchSize) break;
    }

    this.logger.info({ tenant, ...report }, "embedding backfill finished");
    return report;
  }
}
