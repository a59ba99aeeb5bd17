export { QUEUE_NAMES, createQueues, closeQueues } from "./queues.js";
export type { QueueConfig, QueueName, Queues } from "./queues.js";
export { DLQ_NAME, createDeadLetterQueue, moveToDeadLetter } from "./dlq.js";
export type { DeadLetterData, DeadLetterInput, DeadLetterQueue } from "./dlq.js";
export { BullmqIngestionDispatcher, enqueueBackfill, enqueueDelete } from "./dispatcher.js";
export type { JobQueue } from "./dispatcher.js";
export { parseRedisConnection } from "./connection.js";
