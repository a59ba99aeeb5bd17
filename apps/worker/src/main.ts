import { Worker } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { AnyJobData } from "@docsift/types";
import { parseEnv } from "@docsift/config";
import { QUEUE_NAMES, type DeadLetterQueue } from "@docsift/queue";
import { createLogger, type Logger } from "@docsift/logger";
import { errorMessage } from "@docsift/errors";
import { closeWorkerContainer, createWorkerContainer, prepareDatabase } from "./container.js";
import { handleFailedJob } from "./dead-letter.js";
import { processJob, type ProcessorServices } from "./processors/index.js";

const SHUTDOWN_TIMEOUT_MS = 30_000;

interface WorkerSpec {
  queue: string;
  concurrency: number;
}

function createWorkers(
  specs: WorkerSpec[],
  connection: ConnectionOptions,
  services: ProcessorServices,
  dlq: DeadLetterQueue,
  logger: Logger,
): Worker<AnyJobData>[] {
  return specs.map(({ queue, concurrency }) => {
    const worker = new Worker<AnyJobData>(queue, (job) => processJob(services, job.data), {
      connection,
      concurrency,
    });

    worker.on("failed", (job, err) => {
      handleFailedJob(dlq, queue, job, err, logger).catch((dlqErr: unknown) => {
        logger.error({ queue, err: errorMessage(dlqErr) }, "failed-job handler threw");
      });
    });
    worker.on("error", (err) => {
      logger.error({ queue, err: err.message }, "worker error");
    });
    return worker;
  });
}

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "worker" });
  const container = createWorkerContainer(config, logger);
  await prepareDatabase(container);

  const workers = createWorkers(
    [
      { queue: QUEUE_NAMES.INGEST, concurrency: config.worker.concurrency },
      { queue: QUEUE_NAMES.BACKFILL, concurrency: 1 },
      { queue: QUEUE_NAMES.DELETE, concurrency: 3 },
    ],
    container.connection,
    container.services,
    container.dlq,
    logger,
  );
  logger.info({ queues: Object.values(QUEUE_NAMES), workers: workers.length }, "worker started");

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "shutting down");

    const timer = setTimeout(() => {
      logger.error({ timeoutMs: SHUTDOWN_TIMEOUT_MS }, "shutdown timed out");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    timer.unref();

    // Active jobs finish before close() resolves.
    await Promise.all(workers.map((w) => w.close()));
    await closeWorkerContainer(container);
    logger.info("worker stopped");
    process.exit(0);
  };

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err: errorMessage(err) }, "shutdown failed");
        process.exit(1);
      });
    });
  }
}

main().catch((err: unknown) => {
  createLogger({ service: "worker" }).fatal({ err: errorMessage(err) }, "worker failed to start");
  process.exit(1);
});
