import { AppError } from "./app-error.js";
import { ExternalServiceError, RateLimitedError } from "./errors.js";

function statusOf(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) return undefined;
  if ("status" in error && typeof error.status === "number") return error.status;
  if ("statusCode" in error && typeof error.statusCode === "number") return error.statusCode;
  return undefined;
}

/**
 * Map a failure thrown by a provider SDK (OpenAI, Cohere, Qdrant) onto the error
 * taxonomy: HTTP 429 becomes {@link RateLimitedError}, anything else an
 * {@link ExternalServiceError}. AppErrors pass through unchanged.
 */
export function toProviderError(service: string, error: unknown): AppError {
  if (AppError.isAppError(error)) return error;

  const status = statusOf(error);
  const message = error instanceof Error ? error.message : String(error);

  if (status === 429) {
    return new RateLimitedError(`${service} rate limit exceeded`, 60, { cause: error });
  }

  return new ExternalServiceError(`${service} request failed: ${message}`, service, {
    details: status === undefined ? undefined : { status },
    cause: error,
  });
}
