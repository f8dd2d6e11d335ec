import type { LangfuseConfig } from "@ragweave/types";
import type { Tracer } from "./types.js";
import { createNoopTracer } from "./noop-tracer.js";
import { createLangfuseTracer } from "./langfuse-tracer.js";

/** Langfuse when both keys are configured, otherwise the noop tracer. */
export function createTracer(config: LangfuseConfig): Tracer {
  if (!config.publicKey || !config.secretKey) {
    return createNoopTracer();
  }

  return createLangfuseTracer({
    publicKey: config.publicKey,
    secretKey: config.secretKey,
    baseUrl: config.baseUrl,
  });
}
