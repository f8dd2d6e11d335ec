import type { Logger } from "@ragweave/logger";
import { createStrategy, type StrategyDependencies } from "@ragweave/strategies";
import type { DeindexJobData, JobResult } from "@ragweave/types";

export async function processDeindexJob(
  data: DeindexJobData,
  deps: StrategyDependencies,
  logger: Logger,
): Promise<JobResult> {
  const startedAt = Date.now();
  const strategy = createStrategy(data.strategyId, data.strategyConfig, deps);

  await strategy.deindex({
    ids: data.ids,
    deleteAll: data.deleteAll,
    filter: data.filter,
    namespace: data.namespace,
  });

  const duration = Date.now() - startedAt;
  logger.info({ strategyId: strategy.id, namespace: data.namespace, duration }, "Deindex job completed");

  return { success: true, strategyId: strategy.id, processedAt: new Date(), duration };
}
