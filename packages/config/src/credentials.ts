import { ConfigurationError } from "@ragweave/errors";

export type Env = Record<string, string | undefined>;

/** Language-model key plus the tracing key pair every strategy needs. */
export const MODEL_CREDENTIALS = [
  "OPENAI_API_KEY",
  "LANGFUSE_PUBLIC_KEY",
  "LANGFUSE_SECRET_KEY",
] as const;

export const RERANK_CREDENTIALS = ["COHERE_API_KEY"] as const;

/**
 * Throw a {@link ConfigurationError} naming every variable in `names` that is
 * unset or empty in `env`.
 */
export function assertCredentials(names: readonly string[], env: Env = process.env): void {
  const missing = names.filter((name) => {
    const value = env[name];
    return value === undefined || value.trim().length === 0;
  });

  if (missing.length > 0) {
    throw new ConfigurationError(`Missing required credentials: ${missing.join(", ")}`, {
      details: { missing },
    });
  }
}

export function assertModelCredentials(env: Env = process.env): void {
  assertCredentials(MODEL_CREDENTIALS, env);
}
