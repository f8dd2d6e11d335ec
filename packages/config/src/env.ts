import { z } from "zod";
import type { AppConfig } from "@ragweave/types";

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.length > 0 ? value : undefined));

/**
 * Zod schema for every environment variable the model service and worker read.
 */
export const envSchema = z.object({
  // ---------- Core ----------
  NODE_ENV: z.enum(["development", "test", "production"]).default("production"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  NAMESPACE_ISOLATION: z.enum(["required", "optional"]).default("required"),

  // ---------- Redis (job queues) ----------
  REDIS_URL: z.string().min(1).default("redis://localhost:6379"),

  // ---------- Qdrant ----------
  QDRANT_URL: z.string().min(1, "QDRANT_URL is required"),
  QDRANT_API_KEY: optionalSecret,
  QDRANT_COLLECTION: z.string().min(1).default("ragweave"),

  // ---------- Embeddings ----------
  EMBEDDING_PROVIDER: z.enum(["openai", "cohere"]).default("openai"),
  EMBEDDING_DIMENSIONS: z
    .string()
    .default("1536")
    .transform(Number)
    .pipe(z.number().int().positive()),

  // ---------- OpenAI ----------
  OPENAI_API_KEY: optionalSecret,
  OPENAI_EMBED_MODEL: z.string().default("text-embedding-3-small"),

  // ---------- Cohere ----------
  COHERE_API_KEY: optionalSecret,
  COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
  COHERE_RERANK_MODEL: z.string().default("rerank-v3.5"),

  // ---------- Langfuse tracing ----------
  LANGFUSE_PUBLIC_KEY: optionalSecret,
  LANGFUSE_SECRET_KEY: optionalSecret,
  LANGFUSE_BASE_URL: z.string().url().default("https://cloud.langfuse.com"),
});

/**
 * Parse and validate process.env (or any compatible record) into a strongly-typed
 * {@link AppConfig}. Throws a ZodError with detailed messages when validation fails.
 *
 * Credentials stay optional here; the components that need them check for them
 * when they are constructed (see `assertModelCredentials`).
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    namespaceIsolation: parsed.NAMESPACE_ISOLATION,

    redis: {
      url: parsed.REDIS_URL,
    },

    qdrant: {
      url: parsed.QDRANT_URL,
      apiKey: parsed.QDRANT_API_KEY,
      collection: parsed.QDRANT_COLLECTION,
    },

    embeddings: {
      provider: parsed.EMBEDDING_PROVIDER,
      dimensions: parsed.EMBEDDING_DIMENSIONS,
    },

    openai: {
      apiKey: parsed.OPENAI_API_KEY ?? "",
      embedModel: parsed.OPENAI_EMBED_MODEL,
    },

    cohere: {
      apiKey: parsed.COHERE_API_KEY ?? "",
      embedModel: parsed.COHERE_EMBED_MODEL,
      rerankModel: parsed.COHERE_RERANK_MODEL,
    },

    langfuse: {
      publicKey: parsed.LANGFUSE_PUBLIC_KEY,
      secretKey: parsed.LANGFUSE_SECRET_KEY,
      baseUrl: parsed.LANGFUSE_BASE_URL,
    },
  };
}
