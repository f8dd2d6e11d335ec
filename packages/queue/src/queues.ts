import { Queue } from "bullmq";
import type { ConnectionOptions, JobsOptions } from "bullmq";
import type { DeindexJobData, IndexJobData } from "@ragweave/types";

export const QUEUE_NAMES = {
  INDEX: "ragweave:index",
  DEINDEX: "ragweave:deindex",
} as const;

export const DEFAULT_JOB_OPTIONS = {
  attempts: 3,
  backoff: {
    type: "exponential" as const,
    delay: 1000,
  },
  removeOnComplete: { count: 1000 },
  removeOnFail: { count: 5000 },
} satisfies JobsOptions;

export interface QueueConfig {
  connection: ConnectionOptions;
}

export function createQueues(config: QueueConfig) {
  const indexQueue = new Queue<IndexJobData>(QUEUE_NAMES.INDEX, {
    connection: config.connection,
    defaultJobOptions: DEFAULT_JOB_OPTIONS,
  });

  const deindexQueue = new Queue<DeindexJobData>(QUEUE_NAMES.DEINDEX, {
    connection: config.connection,
    defaultJobOptions: {
      ...DEFAULT_JOB_OPTIONS,
      priority: 1, // deletes jump ahead of pending index jobs
    },
  });

  return { indexQueue, deindexQueue };
}

export type Queues = ReturnType<typeof createQueues>;

/** Queue documents for background indexing; resolves to the job id. */
export async function enqueueIndex(queues: Queues, data: IndexJobData): Promise<string | undefined> {
  const job = await queues.indexQueue.add("index", data);
  return job.id;
}

export async function enqueueDeindex(
  queues: Queues,
  data: DeindexJobData,
): Promise<string | undefined> {
  const job = await queues.deindexQueue.add("deindex", data);
  return job.id;
}

export async function closeQueues(queues: Queues): Promise<void> {
  await Promise.all([queues.indexQueue.close(), queues.deindexQueue.close()]);
}
