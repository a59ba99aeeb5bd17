import { describe, it, expect, beforeEach } from "vitest";
import { MemoryDocumentStore } from "@docsift/db";
import { NotFoundError, ValidationError } from "@docsift/errors";
import type { IFileStorage } from "./file-storage.js";
import { DocumentService, type IEmbeddingInvalidator } from "./document-service.js";

const TENANT = "tenant-a";

class FakeStorage implements IFileStorage {
  removed: string[] = [];
  failing = false;

  save(): Promise<string> {
    return Promise.resolve("unused");
  }

  read(): Promise<Uint8Array> {
    return Promise.resolve(new Uint8Array());
  }

  remove(path: string): Promise<boolean> {
    if (this.failing) return Promise.reject(new Error("permission denied"));
    this.removed.push(path);
    return Promise.resolve(true);
  }
}

class FakeInvalidator implements IEmbeddingInvalidator {
  forgotten: string[] = [];

  forget(texts: string[]): number {
    this.forgotten.push(...texts);
    return texts.length;
  }
}

describe("DocumentService", () => {
  let documents: MemoryDocumentStore;
  let files: FakeStorage;
  let cache: FakeInvalidator;
  let service: DocumentService;

  async function addDocument(): Promise<string> {
    const document = await documents.createDocument({
      tenant: TENANT,
      title: "Handbook",
      source: "upload",
      metadata: { storedPath: "/files/tenant-a/handbook.pdf" },
    });
    await documents.insertChunks(
      TENANT,
      document.id,
      ["Intro", "Policies", "Benefits"].map((content, ordinal) => ({
        ordinal,
        content,
        meta: { strategy: "window" },
        embedding: null,
      })),
    );
    return document.id;
  }

  beforeEach(() => {
    documents = new MemoryDocumentStore();
    files = new FakeStorage();
    cache = new FakeInvalidator();
    service = new DocumentService({ documents, files, embeddingCache: cache });
  });

  it("throws NotFoundError for an unknown document", async () => {
    await expect(service.getDocument(TENANT, "missing")).rejects.toThrow(NotFoundError);
  });

  it("pages through chunks with the total count", async () => {
    const id = await addDocument();

    const page = await service.listChunks(TENANT, id, 1, 1);

    expect(page.total).toBe(3);
    expect(page.offset).toBe(1);
    expect(page.limit).toBe(1);
    expect(page.chunks.map((chunk) => chunk.content)).toEqual(["Policies"]);
  });

  it("rejects page sizes outside 1..500 and negative offsets", async () => {
    const id = await addDocument();

    await expect(service.listChunks(TENANT, id, 0, 0)).rejects.toThrow(ValidationError);
    await expect(service.listChunks(TENANT, id, 0, 501)).rejects.toThrow("limit must be between 1 and 500");
    await expect(service.listChunks(TENANT, id, -1, 10)).rejects.toThrow("offset must be a non-negative integer");
  });

  it("deletes the document with its chunks, stored file and cached vectors", async () => {
    const id = await addDocument();

    const report = await service.deleteDocument(TENANT, id);

    expect(report).toEqual({ documentId: id, chunksDeleted: 3, fileRemoved: true, cacheEntriesRemoved: 3 });
    expect(files.removed).toEqual(["/files/tenant-a/handbook.pdf"]);
    expect(cache.forgotten).toEqual(["Intro", "Policies", "Benefits"]);
    expect(await documents.countChunks(TENANT, id)).toBe(0);
    await expect(service.getDocument(TENANT, id)).rejects.toThrow(NotFoundError);
  });

  it("still deletes the document when the file cannot be removed", async () => {
    const id = await addDocument();
    files.failing = true;

    const report = await service.deleteDocument(TENANT, id);

    expect(report.fileRemoved).toBe(false);
    expect(await documents.getDocument(TENANT, id)).toBeNull();
  });

  it("does not delete another tenant's document", async () => {
    const id = await addDocument();

    await expect(service.deleteDocument("tenant-b", id)).rejects.toThrow(NotFoundError);
    expect(await documents.countChunks(TENANT, id)).toBe(3);
  });

  it("returns the latest document or null", async () => {
    expect(await service.latestDocument(TENANT)).toBeNull();
    const id = await addDocument();
    expect((await service.latestDocument(TENANT))?.id).toBe(id);
  });
});
