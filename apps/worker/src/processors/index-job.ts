import type { Logger } from "@ragweave/logger";
import { createStrategy, type StrategyDependencies } from "@ragweave/strategies";
import type { IndexJobData, JobResult, RetrievalStrategy } from "@ragweave/types";

/**
 * A retried job first removes what earlier attempts wrote for its file, since
 * every upsert stores fresh ids. Without a file_id there is nothing to scope the
 * cleanup to and the retry proceeds as is.
 */
async function clearEarlierAttempt(
  strategy: RetrievalStrategy,
  data: IndexJobData,
  attemptsMade: number,
  logger: Logger,
): Promise<void> {
  const fileId = data.metadata?.file_id;
  if (fileId === undefined) {
    logger.warn(
      { strategyId: strategy.id, namespace: data.namespace, attemptsMade },
      "Retrying index job without a file_id; earlier partial writes are kept",
    );
    return;
  }

  await strategy.deindex({ namespace: data.namespace, filter: { file_id: fileId } });
  logger.info({ namespace: data.namespace, fileId, attemptsMade }, "Cleared earlier attempt before retry");
}

/**
 * Index job processor: build the requested strategy and index the job's
 * documents under its namespace. Recording the outcome against the file is
 * left to whoever enqueued the job.
 */
export async function processIndexJob(
  data: IndexJobData,
  deps: StrategyDependencies,
  logger: Logger,
  attemptsMade = 0,
): Promise<JobResult> {
  const startedAt = Date.now();
  const strategy = createStrategy(data.strategyId, data.strategyConfig, deps);

  if (attemptsMade > 0) {
    await clearEarlierAttempt(strategy, data, attemptsMade, logger);
  }

  const ack = await strategy.index(data.documents, {
    namespace: data.namespace,
    metadata: data.metadata,
  });

  const duration = Date.now() - startedAt;
  const metrics = {
    documents: ack.documents,
    chunks: ack.chunkIds.length,
    summaries: ack.summaryIds.length,
  };
  logger.info(
    { strategyId: strategy.id, namespace: data.namespace, ...metrics, duration },
    "Index job completed",
  );

  return { success: true, strategyId: strategy.id, processedAt: new Date(), duration, metrics };
}
