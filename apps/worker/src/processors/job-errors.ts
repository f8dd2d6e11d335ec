import { UnrecoverableError } from "bullmq";
import { AppError, ConfigurationError } from "@ragweave/errors";

/**
 * Failures a retry cannot fix: bad input (4xx) and missing configuration.
 * Rate limits are the exception among 4xx and stay retryable.
 */
export function isPermanentFailure(error: unknown): boolean {
  if (error instanceof ConfigurationError) return true;
  if (!AppError.isAppError(error)) return false;
  return error.statusCode >= 400 && error.statusCode < 500 && error.statusCode !== 429;
}

/** Run a job body, marking permanent failures so BullMQ skips the remaining attempts. */
export async function runJob<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (isPermanentFailure(error) && error instanceof Error) {
      throw new UnrecoverableError(error.message);
    }
    throw error;
  }
}

export interface FailedJobInfo {
  attemptsMade: number;
  opts: { attempts?: number };
}

/** Whether a failed job has no attempts left. */
export function isFinalFailure(job: FailedJobInfo, error: Error): boolean {
  return error instanceof UnrecoverableError || job.attemptsMade >= (job.opts.attempts ?? 1);
}
