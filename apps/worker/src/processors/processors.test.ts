import { describe, it, expect, vi } from "vitest";
import type { BackfillJobData, DeleteJobData, IngestJobData, IngestionJob } from "@docsift/types";
import type { BackfillReport, DeletionReport } from "@docsift/core";
import { ExternalServiceError, NotFoundError } from "@docsift/errors";
import { createSilentLogger } from "@docsift/logger";
import { processJob, type ProcessorServices } from "./index.js";

const ingestData: IngestJobData = {
  type: "ingest",
  tenant: "acme",
  jobId: "job-1",
  source: { kind: "text", text: "hello", title: "Note" },
  options: {},
};

const completedJob: IngestionJob = {
  id: "job-1",
  tenant: "acme",
  status: "completed",
  progress: 100,
  result: null,
  error: null,
  createdAt: new Date(0),
  updatedAt: new Date(0),
};

function servicesWith(overrides: Partial<ProcessorServices> = {}): ProcessorServices {
  return {
    jobs: { run: vi.fn(() => Promise.resolve(completedJob)) },
    backfill: {
      run: vi.fn(() => Promise.resolve<BackfillReport>({ batches: 1, embedded: 3, interrupted: false })),
    },
    documents: {
      deleteDocument: vi.fn(() =>
        Promise.resolve<DeletionReport>({
          documentId: "doc-1",
          chunksDeleted: 3,
          fileRemoved: true,
          cacheEntriesRemoved: 2,
        }),
      ),
    },
    logger: createSilentLogger(),
    ...overrides,
  };
}

describe("processJob", () => {
  it("runs ingest jobs through the job service", async () => {
    const services = servicesWith();

    await expect(processJob(services, ingestData)).resolves.toEqual(completedJob);
    expect(services.jobs.run).toHaveBeenCalledWith(ingestData);
  });

  it("passes backfill scope and batch size", async () => {
    const services = servicesWith();
    const data: BackfillJobData = { type: "backfill", tenant: "acme", documentId: "doc-1", batchSize: 16 };

    await expect(processJob(services, data)).resolves.toEqual({ batches: 1, embedded: 3, interrupted: false });
    expect(services.backfill.run).toHaveBeenCalledWith("acme", { batchSize: 16, documentId: "doc-1" });
  });

  it("throws on an interrupted backfill so the queue retries it", async () => {
    const services = servicesWith({
      backfill: {
        run: () => Promise.resolve({ batches: 2, embedded: 40, interrupted: true, error: "rate limited" }),
      },
    });

    const attempt = processJob(services, { type: "backfill", tenant: "acme", batchSize: 20 });

    await expect(attempt).rejects.toThrow(ExternalServiceError);
    await expect(attempt).rejects.toThrow("Backfill interrupted after 40 chunks: rate limited");
  });

  it("deletes the document and returns the cascade report", async () => {
    const services = servicesWith();
    const data: DeleteJobData = { type: "delete", tenant: "acme", documentId: "doc-1" };

    await expect(processJob(services, data)).resolves.toEqual({
      documentId: "doc-1",
      chunksDeleted: 3,
      fileRemoved: true,
      cacheEntriesRemoved: 2,
    });
    expect(services.documents.deleteDocument).toHaveBeenCalledWith("acme", "doc-1");
  });

  it("treats a document that is already gone as deleted", async () => {
    const services = servicesWith({
      documents: { deleteDocument: () => Promise.reject(new NotFoundError("Document doc-1 not found")) },
    });

    await expect(processJob(services, { type: "delete", tenant: "acme", documentId: "doc-1" })).resolves.toBeNull();
  });

  it("lets other delete failures reach the queue", async () => {
    const services = servicesWith({
      documents: { deleteDocument: () => Promise.reject(new Error("connection reset")) },
    });

    await expect(processJob(services, { type: "delete", tenant: "acme", documentId: "doc-1" })).rejects.toThrow(
      "connection reset",
    );
  });
});
