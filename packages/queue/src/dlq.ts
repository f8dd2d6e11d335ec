import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { AnyJobData } from "@ragweave/types";

export const DLQ_NAME = "ragweave:dead-letter";

export type DeadLetterJobData = AnyJobData & { originalQueue: string; failureReason: string };

/** Jobs that failed their last attempt, kept for inspection. */
export function createDeadLetterQueue(connection: ConnectionOptions) {
  return new Queue<DeadLetterJobData>(DLQ_NAME, {
    connection,
    defaultJobOptions: {
      removeOnComplete: false,
      removeOnFail: false,
    },
  });
}

export type DeadLetterQueue = ReturnType<typeof createDeadLetterQueue>;
