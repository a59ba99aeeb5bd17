import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { BackfillJobData, DeleteJobData, IngestJobData } from "@docsift/types";

export const QUEUE_NAMES = {
  INGEST: "docsift:ingest",
  BACKFILL: "docsift:backfill",
  DELETE: "docsift:delete",
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

export interface QueueConfig {
  connection: ConnectionOptions;
}

export function createQueues(config: QueueConfig) {
  const defaultOpts = {
    connection: config.connection,
    defaultJobOptions: {
      attempts: 3,
      backoff: {
        type: "exponential" as const,
        delay: 1000,
      },
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  };

  // The pipeline already retries with degraded options; one queue attempt is enough.
  const ingestQueue = new Queue<IngestJobData>(QUEUE_NAMES.INGEST, {
    ...defaultOpts,
    defaultJobOptions: {
      ...defaultOpts.defaultJobOptions,
      attempts: 1,
    },
  });

  const backfillQueue = new Queue<BackfillJobData>(QUEUE_NAMES.BACKFILL, defaultOpts);

  const deleteQueue = new Queue<DeleteJobData>(QUEUE_NAMES.DELETE, {
    ...defaultOpts,
    defaultJobOptions: {
      ...defaultOpts.defaultJobOptions,
      priority: 1, // High priority for deletes
    },
  });

  return { ingestQueue, backfillQueue, deleteQueue };
}

export type Queues = ReturnType<typeof createQueues>;

export async function closeQueues(queues: Queues): Promise<void> {
  await Promise.all([queues.ingestQueue.close(), queues.backfillQueue.close(), queues.deleteQueue.close()]);
}
