import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { AnyJobData } from "@docsift/types";
import type { JobQueue } from "./dispatcher.js";

export const DLQ_NAME = "docsift:dead-letter";

export type DeadLetterData = AnyJobData & {
  originalQueue: string;
  originalJobId?: string;
  failureReason: string;
  attemptsMade: number;
  failedAt: string;
};

export function createDeadLetterQueue(connection: ConnectionOptions) {
  return new Queue<DeadLetterData>(DLQ_NAME, {
    connection,
    defaultJobOptions: {
      removeOnComplete: false,
      removeOnFail: false,
    },
  });
}

export type DeadLetterQueue = ReturnType<typeof createDeadLetterQueue>;

export interface DeadLetterInput {
  queueName: string;
  jobId?: string;
  data: AnyJobData;
  reason: string;
  attemptsMade: number;
}

/** Copy a job that exhausted its attempts; the original stays in its failed set. */
export async function moveToDeadLetter(
  dlq: JobQueue<DeadLetterData>,
  input: DeadLetterInput,
  now: Date = new Date(),
): Promise<void> {
  await dlq.add(`${input.data.type}:dead`, {
    ...input.data,
    originalQueue: input.queueName,
    ...(input.jobId !== undefined ? { originalJobId: input.jobId } : {}),
    failureReason: input.reason,
    attemptsMade: input.attemptsMade,
    failedAt: now.toISOString(),
  });
}
