import type { TraceHandle, Tracer } from "./types.js";

export type RunMethod = "index" | "invoke" | "deindex";

/** Call metadata attached to every traced strategy call. */
export interface RunConfig {
  runName: string;
  tags: string[];
  metadata: {
    instance_id: string;
    user_id: string | null;
    method: RunMethod;
  };
}

export function buildRunConfig(
  instanceId: string,
  method: RunMethod,
  callerId?: string,
): RunConfig {
  return {
    runName: `[${instanceId}]-${method}`,
    tags: [instanceId],
    metadata: {
      instance_id: instanceId,
      user_id: callerId ?? null,
      method,
    },
  };
}

/**
 * Run `fn` inside one trace opened with `config`. The trace records the error
 * message when `fn` rejects and is always ended; the rejection propagates.
 */
export async function runTraced<T>(
  tracer: Tracer,
  config: RunConfig,
  input: unknown,
  fn: (trace: TraceHandle) => Promise<T>,
): Promise<T> {
  const trace = tracer.trace({
    name: config.runName,
    input,
    metadata: config.metadata,
    tags: config.tags,
    userId: config.metadata.user_id ?? undefined,
  });

  try {
    const output = await fn(trace);
    trace.update({ output });
    return output;
  } catch (error) {
    trace.update({
      metadata: { error: error instanceof Error ? error.message : String(error) },
    });
    throw error;
  } finally {
    trace.end();
  }
}
