import type { AnyJobData } from "@docsift/types";
import { moveToDeadLetter, type DeadLetterData, type JobQueue } from "@docsift/queue";
import { errorMessage } from "@docsift/errors";
import type { Logger } from "@docsift/logger";

/** The fields of a failed BullMQ job the dead-letter handler reads. */
export interface FailedJobView {
  id?: string;
  data: AnyJobData;
  attemptsMade: number;
  opts: { attempts?: number };
}

/**
 * Copies a job to the dead-letter queue once it has used every attempt.
 * Returns whether it was moved.
 */
export async function handleFailedJob(
  dlq: JobQueue<DeadLetterData>,
  queueName: string,
  job: FailedJobView | undefined,
  err: Error,
  logger: Logger,
): Promise<boolean> {
  if (!job) return false;

  const maxAttempts = job.opts.attempts ?? 1;
  const log = logger.child({ queue: queueName, jobId: job.id, tenant: job.data.tenant });
  if (job.attemptsMade < maxAttempts) {
    log.warn({ attempt: job.attemptsMade, maxAttempts, err: err.message }, "job failed, will retry");
    return false;
  }

  try {
    await moveToDeadLetter(dlq, {
      queueName,
      ...(job.id !== undefined ? { jobId: job.id } : {}),
      data: job.data,
      reason: err.message,
      attemptsMade: job.attemptsMade,
    });
  } catch (dlqErr) {
    log.error({ err: errorMessage(dlqErr) }, "dead-letter write failed");
    return false;
  }
  log.error({ attempts: job.attemptsMade, err: err.message }, "job moved to dead-letter queue");
  return true;
}
