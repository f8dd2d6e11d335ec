import { Worker } from "bullmq";
import type { ConnectionOptions, Job } from "bullmq";
import { parseEnv } from "@ragweave/config";
import { createChildLogger, createLogger, type Logger } from "@ragweave/logger";
import { QUEUE_NAMES, createDeadLetterQueue, type DeadLetterQueue } from "@ragweave/queue";
import { createStrategyDependencies, type StrategyDependencies } from "@ragweave/strategies";
import type { AnyJobData, DeindexJobData, IndexJobData } from "@ragweave/types";
import { parseRedisConnection } from "./connection.js";
import { processDeindexJob } from "./processors/deindex-job.js";
import { processIndexJob } from "./processors/index-job.js";
import { isFinalFailure, runJob } from "./processors/job-errors.js";

function deadLetterOnFinalFailure(
  worker: Worker,
  dlq: DeadLetterQueue,
  logger: Logger,
): void {
  worker.on("failed", (job: Job<AnyJobData> | undefined, error: Error) => {
    if (!job) return;
    const jobId = job.id;
    logger.warn({ queue: worker.name, jobId, attempt: job.attemptsMade, err: error }, "Job failed");
    if (!isFinalFailure(job, error)) return;

    void dlq
      .add("dead-letter", { ...job.data, originalQueue: worker.name, failureReason: error.message })
      .catch((dlqError: unknown) => {
        logger.error({ jobId, err: dlqError }, "Could not dead-letter job");
      });
  });
}

function createWorkers(
  connection: ConnectionOptions,
  deps: StrategyDependencies,
  logger: Logger,
): Worker[] {
  const indexWorker = new Worker<IndexJobData>(
    QUEUE_NAMES.INDEX,
    async (job) =>
      runJob(() =>
        processIndexJob(job.data, deps, createChildLogger(logger, { jobId: job.id }), job.attemptsMade),
      ),
    // Summaries are paced per batch; a low concurrency keeps the rate limits in reach
    { connection, concurrency: 2 },
  );

  const deindexWorker = new Worker<DeindexJobData>(
    QUEUE_NAMES.DEINDEX,
    async (job) => runJob(() => processDeindexJob(job.data, deps, createChildLogger(logger, { jobId: job.id }))),
    { connection, concurrency: 3 },
  );

  return [indexWorker, deindexWorker];
}

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "ragweave-worker" });
  const deps = await createStrategyDependencies(config, { logger });

  const connection = parseRedisConnection(config.redis.url);
  const dlq = createDeadLetterQueue(connection);
  const workers = createWorkers(connection, deps, logger);
  for (const worker of workers) deadLetterOnFinalFailure(worker, dlq, logger);

  logger.info({ queues: Object.values(QUEUE_NAMES), workers: workers.length }, "Worker started");

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down");
    await Promise.all(workers.map((w) => w.close()));
    await dlq.close();
    await deps.tracer.shutdown();
    logger.info("All workers closed");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());
}

main().catch((err: unknown) => {
  createLogger({ service: "ragweave-worker" }).fatal({ err }, "Worker failed to start");
  process.exit(1);
});
