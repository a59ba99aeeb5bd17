import { describe, it, expect, beforeEach, vi } from "vitest";
import type { AppConfig, EmbeddingResult, IngestionJob, JobUpdate } from "@docsift/types";
import { MemoryDocumentStore, MemoryJobStore } from "@docsift/db";
import type { IEmbeddingProvider } from "@docsift/embeddings";
import { createExtractionServices, createExternalTools, type IPdfReader, type PdfText } from "@docsift/extractor";
import { ExternalServiceError, NotFoundError } from "@docsift/errors";
import { IngestionJobService, InProcessDispatcher } from "./ingestion-jobs.js";
import { IngestionPipeline } from "./ingestion-pipeline.js";

const TENANT = "tenant-a";
const NOTES =
  "Meeting notes for the warehouse team. Deliveries move to Tuesday and the loading dock closes early on Friday.";

class RecordingJobStore extends MemoryJobStore {
  created: string[] = [];
  updates: JobUpdate[] = [];

  override async createJob(tenant: string): Promise<IngestionJob> {
    const job = await super.createJob(tenant);
    this.created.push(job.id);
    return job;
  }

  override updateJob(id: string, update: JobUpdate): Promise<IngestionJob> {
    this.updates.push(update);
    return super.updateJob(id, update);
  }
}

class NoPdfReader implements IPdfReader {
  readText(): Promise<PdfText> {
    return Promise.resolve({ text: "", pageCount: 1 });
  }

  countPages(): Promise<number> {
    return Promise.resolve(1);
  }
}

const embeddings: IEmbeddingProvider = {
  name: "fake",
  model: "fake-embed",
  dimensions: 2,
  embed: (text: string): Promise<EmbeddingResult> =>
    Promise.resolve({ embeddings: [[1, text.length]], model: "fake-embed", tokensUsed: 0, dimensions: 2 }),
  batchEmbed: (texts: string[]): Promise<EmbeddingResult> =>
    Promise.resolve({
      embeddings: texts.map((text) => [1, text.length]),
      model: "fake-embed",
      tokensUsed: 0,
      dimensions: 2,
    }),
  healthCheck: () => Promise.resolve(true),
};

const config: Pick<AppConfig, "ingestion" | "tools"> = {
  ingestion: {
    maxFileSizeBytes: 1_000_000,
    maxPages: 100,
    minChunkLength: 50,
    byteChunkingThreshold: 2 * 1024 * 1024,
    storageDir: "unused",
  },
  tools: { ocr: [], pdftotext: [], pdfTables: [], pdfImageOcr: [], office: [] },
};

describe("IngestionJobService", () => {
  let jobs: RecordingJobStore;
  let pipeline: IngestionPipeline;
  let dispatcher: InProcessDispatcher;
  let service: IngestionJobService;

  beforeEach(() => {
    jobs = new RecordingJobStore();
    pipeline = new IngestionPipeline({
      extraction: createExtractionServices(config, {
        tools: createExternalTools(config.tools),
        pdfReader: new NoPdfReader(),
      }),
      documents: new MemoryDocumentStore(),
      embeddings,
      config,
    });
    dispatcher = new InProcessDispatcher((data) => service.run(data));
    service = new IngestionJobService({ jobs, pipeline, dispatcher });
  });

  it("answers with a queued job and completes it in the background", async () => {
    const job = await service.submit(TENANT, { kind: "text", text: NOTES, title: "Notes" });

    expect(job.status).toBe("queued");
    expect(job.progress).toBe(0);

    await dispatcher.drain();
    const finished = await service.getJob(TENANT, job.id);
    expect(finished.status).toBe("completed");
    expect(finished.progress).toBe(100);
    expect(finished.result?.success).toBe(true);
    expect(finished.error).toBeNull();
  });

  it("moves progress forward through each milestone and writes one terminal status", async () => {
    await service.submit(TENANT, { kind: "text", text: NOTES, title: "Notes" });
    await dispatcher.drain();

    expect(jobs.updates).toEqual([
      { status: "processing" },
      { progress: 10 },
      { progress: 30 },
      { progress: 90 },
      { status: "completed", progress: 100, result: expect.objectContaining({ success: true }) },
    ]);
  });

  it("fails the job with the pipeline's error", async () => {
    const job = await service.submit(TENANT, { kind: "text", text: "   ", title: "Blank" });
    await dispatcher.drain();

    const finished = await service.getJob(TENANT, job.id);
    expect(finished.status).toBe("failed");
    expect(finished.error).toBe("Text is empty");
    expect(finished.result).toMatchObject({ success: false, failedStage: "validation" });
  });

  it("returns a finished job untouched when it is run again", async () => {
    const job = await service.submit(TENANT, { kind: "text", text: NOTES, title: "Notes" });
    await dispatcher.drain();
    const finished = await service.getJob(TENANT, job.id);
    const updatesBefore = jobs.updates.length;

    const again = await service.run({
      type: "ingest",
      tenant: TENANT,
      jobId: job.id,
      source: { kind: "text", text: NOTES, title: "Notes" },
      options: {},
    });

    expect(again).toEqual(finished);
    expect(jobs.updates).toHaveLength(updatesBefore);
  });

  it("marks the job failed when it cannot be dispatched", async () => {
    const broken = new IngestionJobService({
      jobs,
      pipeline,
      dispatcher: { dispatch: () => Promise.reject(new Error("redis down")) },
    });

    await expect(broken.submit(TENANT, { kind: "text", text: NOTES, title: "Notes" })).rejects.toThrow(
      ExternalServiceError,
    );

    const [jobId] = jobs.created;
    if (jobId === undefined) throw new Error("a job should have been created");
    const job = await broken.getJob(TENANT, jobId);
    expect(job.status).toBe("failed");
    expect(job.error).toBe("Dispatch failed: redis down");
  });

  it("throws NotFoundError for an unknown job or another tenant's job", async () => {
    const job = await service.submit(TENANT, { kind: "text", text: NOTES, title: "Notes" });
    await dispatcher.drain();

    await expect(service.getJob(TENANT, "missing")).rejects.toThrow(NotFoundError);
    await expect(service.getJob("tenant-b", job.id)).rejects.toThrow(NotFoundError);
  });
});

describe("InProcessDispatcher", () => {
  it("returns before the job runs and settles failures on its own", async () => {
    const runner = vi.fn(() => Promise.reject(new Error("boom")));
    const dispatcher = new InProcessDispatcher(runner);

    const accepted = dispatcher.dispatch({
      type: "ingest",
      tenant: TENANT,
      jobId: "job-1",
      source: { kind: "text", text: NOTES, title: "Notes" },
      options: {},
    });
    expect(runner).not.toHaveBeenCalled();
    expect(dispatcher.inFlight).toBe(1);

    await accepted;
    await dispatcher.drain();
    expect(runner).toHaveBeenCalledTimes(1);
    expect(dispatcher.inFlight).toBe(0);
  });
});
