import { RateLimitedError, sleep as defaultSleep, withRetry } from "@ragweave/errors";
import { createSilentLogger, type Logger } from "@ragweave/logger";
import { NOOP_RUN, type Pipeline, type RunContext } from "./pipeline.js";

export interface BatchInvokeOptions {
  /** Retries per batch after the first attempt. Default: 5 */
  maxRetries?: number;
  /** Caller tier 1-5; tiers 4 and up get larger batches. Default: 1 */
  userTier?: number;
  /** Base wait after a rate limit; retry `n` waits `(n + 1) * retryDelayMs`. Default: 60s */
  retryDelayMs?: number;
  /** Pause after a successful batch before the next one. Default: 2s */
  pacingMs?: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
  run?: RunContext;
}

export const STANDARD_BATCH_SIZE = 30;
export const HIGH_TIER_BATCH_SIZE = 80;
export const HIGH_TIER_THRESHOLD = 4;

export function batchSizeFor(userTier: number, inputCount: number): number {
  return Math.min(userTier < HIGH_TIER_THRESHOLD ? STANDARD_BATCH_SIZE : HIGH_TIER_BATCH_SIZE, inputCount);
}

/**
 * Run `pipeline.batch` over consecutive slices of `inputs`, one slice at a time.
 *
 * A rate-limited slice is retried after a linearly growing wait. A slice still
 * rate limited after `maxRetries` retries is logged and left out of the result,
 * so a missing entry is how callers see partial failure. Any other error
 * propagates.
 */
export async function batchInvokeWithRetry<I, O>(
  pipeline: Pipeline<I, O>,
  inputs: readonly I[],
  options: BatchInvokeOptions = {},
): Promise<O[][]> {
  const {
    maxRetries = 5,
    userTier = 1,
    retryDelayMs = 60_000,
    pacingMs = 2_000,
    sleep = defaultSleep,
    logger = createSilentLogger(),
    run = NOOP_RUN,
  } = options;

  if (inputs.length === 0) return [];

  const batchSize = batchSizeFor(userTier, inputs.length);
  const batchCount = Math.ceil(inputs.length / batchSize);
  const results: O[][] = [];

  for (let index = 0; index < batchCount; index++) {
    const batch = inputs.slice(index * batchSize, (index + 1) * batchSize);
    logger.debug({ batch: index, batchSize: batch.length }, "Invoking batch");

    try {
      const output = await withRetry(() => pipeline.batch(batch, run), {
        maxRetries,
        retryIf: RateLimitedError.isRateLimited,
        backoff: (attempt) => (attempt + 1) * retryDelayMs,
        sleep,
        onRetry: ({ attempt, delayMs }) => {
          logger.warn({ batch: index, attempt, delayMs }, "Rate limited, retrying batch");
        },
      });
      results.push(output);
      if (index < batchCount - 1) await sleep(pacingMs);
    } catch (error) {
      if (!RateLimitedError.isRateLimited(error)) throw error;
      logger.error(
        { batch: index, batchSize: batch.length, maxRetries, err: error },
        "Batch dropped after exhausting rate-limit retries",
      );
    }
  }

  return results;
}
