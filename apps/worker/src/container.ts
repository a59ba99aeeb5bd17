import type { AppConfig } from "@docsift/types";
import {
  applySetupSql,
  closeDbClient,
  createDbClient,
  PostgresDocumentStore,
  PostgresJobStore,
  PostgresMetricsStore,
  type DbClient,
} from "@docsift/db";
import { createCachedEmbeddingProvider } from "@docsift/embeddings";
import { createExtractionServices } from "@docsift/extractor";
import {
  DocumentService,
  EmbeddingBackfill,
  IngestionJobService,
  IngestionPipeline,
  LocalFileStorage,
  MetricsRecorder,
  QuestionSuggester,
} from "@docsift/core";
import {
  BullmqIngestionDispatcher,
  closeQueues,
  createDeadLetterQueue,
  createQueues,
  parseRedisConnection,
  type DeadLetterQueue,
  type Queues,
} from "@docsift/queue";
import type { ConnectionOptions } from "bullmq";
import type { Logger } from "@docsift/logger";
import type { ProcessorServices } from "./processors/index.js";

export interface WorkerContainer {
  services: ProcessorServices;
  pipeline: IngestionPipeline;
  connection: ConnectionOptions;
  queues: Queues;
  dlq: DeadLetterQueue;
  db: DbClient;
}

/**
 * Wires Postgres stores, the cached embedding provider, local file storage
 * and the BullMQ queues into the services the processors call.
 */
export function createWorkerContainer(config: AppConfig, logger: Logger): WorkerContainer {
  const db = createDbClient({ url: config.database.url, maxConnections: config.database.poolMax, role: "worker" });
  const documents = new PostgresDocumentStore(db);
  const jobs = new PostgresJobStore(db);
  const metrics = new MetricsRecorder(new PostgresMetricsStore(db), logger);

  const embeddings = createCachedEmbeddingProvider(config.embeddings, logger);
  const files = new LocalFileStorage(config.ingestion.storageDir);

  const connection = parseRedisConnection(config.redis.url);
  const queues = createQueues({ connection });
  const dlq = createDeadLetterQueue(connection);

  const pipeline = new IngestionPipeline({
    extraction: createExtractionServices(config, { logger }),
    documents,
    embeddings,
    config,
    files,
    suggester: new QuestionSuggester(documents, logger),
    metrics,
    embeddingCache: embeddings.cache,
    logger,
  });

  const services: ProcessorServices = {
    jobs: new IngestionJobService({
      jobs,
      pipeline,
      dispatcher: new BullmqIngestionDispatcher(queues.ingestQueue),
      metrics,
      logger,
    }),
    backfill: new EmbeddingBackfill(documents, embeddings, logger),
    documents: new DocumentService({ documents, files, embeddingCache: embeddings, logger }),
    logger,
  };

  return { services, pipeline, connection, queues, dlq, db };
}

/** Extensions and chunk indexes; idempotent, and the indexes wait for `npm run db:push`. */
export function prepareDatabase(container: WorkerContainer): Promise<void> {
  return applySetupSql(container.db);
}

export async function closeWorkerContainer(container: WorkerContainer): Promise<void> {
  await container.pipeline.drain();
  await closeQueues(container.queues);
  await container.dlq.close();
  await closeDbClient(container.db);
}
