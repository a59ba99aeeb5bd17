import type { Chunk, Document } from "@docsift/types";
import type { IDocumentStore } from "@docsift/db";
import { NotFoundError, ValidationError, errorMessage } from "@docsift/errors";
import { createChildLogger, createSilentLogger, type Logger } from "@docsift/logger";
import type { IFileStorage } from "./file-storage.js";

export const MAX_CHUNK_PAGE_SIZE = 500;

/** Cached embeddings keyed by content; `CachedEmbeddingProvider` fits. */
export interface IEmbeddingInvalidator {
  forget(texts: string[]): number;
}

export interface DocumentServiceDependencies {
  documents: IDocumentStore;
  files?: IFileStorage;
  embeddingCache?: IEmbeddingInvalidator;
  logger?: Logger;
}

export interface ChunkListing {
  chunks: Chunk[];
  total: number;
  offset: number;
  limit: number;
}

export interface DeletionReport {
  documentId: string;
  chunksDeleted: number;
  fileRemoved: boolean;
  cacheEntriesRemoved: number;
}

export class DocumentService {
  private readonly documents: IDocumentStore;
  private readonly files?: IFileStorage;
  private readonly embeddingCache?: IEmbeddingInvalidator;
  private readonly logger: Logger;

  constructor(deps: DocumentServiceDependencies) {
    this.documents = deps.documents;
    this.files = deps.files;
    this.embeddingCache = deps.embeddingCache;
    this.logger = createChildLogger(deps.logger ?? createSilentLogger(), { component: "document-service" });
  }

  async getDocument(tenant: string, id: string): Promise<Document> {
    const document = await this.documents.getDocument(tenant, id);
    if (!document) {
      throw new NotFoundError(`Document ${id} not found`);
    }
    return document;
  }

  latestDocument(tenant: string): Promise<Document | null> {
    return this.documents.latestDocument(tenant);
  }

  async listChunks(tenant: string, id: string, offset = 0, limit = 50): Promise<ChunkListing> {
    if (!Number.isInteger(offset) || offset < 0) {
      throw new ValidationError("offset must be a non-negative integer", { offset: "invalid" });
    }
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_CHUNK_PAGE_SIZE) {
      throw new ValidationError(`limit must be between 1 and ${String(MAX_CHUNK_PAGE_SIZE)}`, { limit: "invalid" });
    }

    await this.getDocument(tenant, id);
    const [chunks, total] = await Promise.all([
      this.documents.listChunks(tenant, id, { offset, limit }),
      this.documents.countChunks(tenant, id),
    ]);
    return { chunks, total, offset, limit };
  }

  /**
   * Removes the document with its chunks, then the stored original and the
   * cached vectors of its content. The last two are best-effort.
   */
  async deleteDocument(tenant: string, id: string): Promise<DeletionReport> {
    const document = await this.getDocument(tenant, id);
    const contents = this.embeddingCache
      ? (await this.documents.listChunks(tenant, id)).map((chunk) => chunk.content)
      : [];
    const chunksDeleted = await this.documents.countChunks(tenant, id);

    if (!(await this.documents.deleteDocument(tenant, id))) {
      throw new NotFoundError(`Document ${id} not found`);
    }

    let fileRemoved = false;
    const storedPath = document.metadata.storedPath;
    if (this.files && storedPath) {
      try {
        fileRemoved = await this.files.remove(storedPath);
      } catch (err) {
        this.logger.warn({ documentId: id, err: errorMessage(err) }, "stored file could not be removed");
      }
    }

    const cacheEntriesRemoved = this.embeddingCache ? this.embeddingCache.forget(contents) : 0;

    this.logger.info({ tenant, documentId: id, chunksDeleted, fileRemoved }, "document deleted");
    return { documentId: id, chunksDeleted, fileRemoved, cacheEntriesRemoved };
  }
}
