import type {
  IIngestionDispatcher,
  IngestJobData,
  IngestionJob,
  IngestionOptions,
  IngestionOutcome,
  JobUpdate,
  SerializableSource,
} from "@docsift/types";
import { TERMINAL_JOB_STATUSES } from "@docsift/types";
import type { IJobStore } from "@docsift/db";
import { ExternalServiceError, NotFoundError, errorMessage } from "@docsift/errors";
import { createChildLogger, createSilentLogger, type Logger } from "@docsift/logger";
import type { IngestionPipeline } from "./ingestion-pipeline.js";
import type { MetricsRecorder } from "./metrics-recorder.js";

export interface IngestionJobServiceDependencies {
  jobs: IJobStore;
  pipeline: IngestionPipeline;
  dispatcher: IIngestionDispatcher;
  metrics?: MetricsRecorder;
  logger?: Logger;
}

/**
 * Asynchronous ingestion. `submit` answers with a queued job at once; a
 * dispatcher later calls `run`, which drives the job to exactly one
 * terminal status.
 */
export class IngestionJobService {
  private readonly jobs: IJobStore;
  private readonly pipeline: IngestionPipeline;
  private readonly dispatcher: IIngestionDispatcher;
  private readonly metrics?: MetricsRecorder;
  private readonly logger: Logger;

  constructor(deps: IngestionJobServiceDependencies) {
    this.jobs = deps.jobs;
    this.pipeline = deps.pipeline;
    this.dispatcher = deps.dispatcher;
    this.metrics = deps.metrics;
    this.logger = createChildLogger(deps.logger ?? createSilentLogger(), { component: "ingestion-jobs" });
  }

  async submit(tenant: string, source: SerializableSource, options: IngestionOptions = {}): Promise<IngestionJob> {
    const job = await this.jobs.createJob(tenant);
    await this.metrics?.record(tenant, "job_transition", 1, { status: job.status });

    try {
      await this.dispatcher.dispatch({ type: "ingest", tenant, jobId: job.id, source, options });
    } catch (err) {
      await this.update(tenant, job.id, { status: "failed", error: `Dispatch failed: ${errorMessage(err)}` });
      throw new ExternalServiceError("Ingestion job could not be queued", "queue", { cause: err });
    }

    this.logger.info({ tenant, jobId: job.id, sourceKind: source.kind }, "ingestion job queued");
    return job;
  }

  async getJob(tenant: string, jobId: string): Promise<IngestionJob> {
    const job = await this.jobs.getJob(tenant, jobId);
    if (!job) throw new NotFoundError(`Ingestion job ${jobId} not found`);
    return job;
  }

  /**
   * Runs one queued job. A job that already finished is returned untouched,
   * so a redelivered message cannot write a second terminal status.
   */
  async run(data: IngestJobData): Promise<IngestionJob> {
    const existing = await this.getJob(data.tenant, data.jobId);
    if (TERMINAL_JOB_STATUSES.includes(existing.status)) {
      this.logger.warn({ jobId: data.jobId, status: existing.status }, "job already finished, skipping");
      return existing;
    }

    await this.update(data.tenant, data.jobId, { status: "processing" });

    let outcome: IngestionOutcome;
    try {
      outcome = await this.pipeline.ingest(data.tenant, data.source, data.options, async (progress) => {
        await this.jobs.updateJob(data.jobId, { progress });
      });
    } catch (err) {
      await this.update(data.tenant, data.jobId, { status: "failed", error: errorMessage(err) });
      throw err;
    }

    return outcome.success
      ? this.update(data.tenant, data.jobId, { status: "completed", progress: 100, result: outcome })
      : this.update(data.tenant, data.jobId, { status: "failed", result: outcome, error: outcome.error });
  }

  private async update(tenant: string, jobId: string, update: JobUpdate): Promise<IngestionJob> {
    const job = await this.jobs.updateJob(jobId, update);
    if (update.status) {
      this.logger.debug({ jobId, status: job.status, progress: job.progress }, "job transition");
      await this.metrics?.record(tenant, "job_transition", 1, { status: job.status });
    }
    return job;
  }
}

/**
 * Runs jobs inside this process without waiting for them. Used when no
 * queue is configured, and in tests through `drain`.
 */
export class InProcessDispatcher implements IIngestionDispatcher {
  private readonly runner: (data: IngestJobData) => Promise<unknown>;
  private readonly logger: Logger;
  private readonly pending = new Set<Promise<void>>();

  constructor(runner: (data: IngestJobData) => Promise<unknown>, logger?: Logger) {
    this.runner = runner;
    this.logger = createChildLogger(logger ?? createSilentLogger(), { component: "in-process-dispatcher" });
  }

  dispatch(data: IngestJobData): Promise<void> {
    const task: Promise<void> = Promise.resolve()
      .then(() => this.runner(data))
      .then(
        () => undefined,
        (err: unknown) => {
          this.logger.error({ jobId: data.jobId, err: errorMessage(err) }, "background ingestion failed");
        },
      )
      .finally(() => {
        this.pending.delete(task);
      });
    this.pending.add(task);
    return Promise.resolve();
  }

  get inFlight(): number {
    return this.pending.size;
  }

  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending]);
    }
  }
}
