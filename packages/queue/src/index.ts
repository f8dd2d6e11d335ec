export {
  QUEUE_NAMES,
  DEFAULT_JOB_OPTIONS,
  createQueues,
  enqueueIndex,
  enqueueDeindex,
  closeQueues,
} from "./queues.js";
export type { QueueConfig, Queues } from "./queues.js";
export { DLQ_NAME, createDeadLetterQueue } from "./dlq.js";
export type { DeadLetterQueue, DeadLetterJobData } from "./dlq.js";
