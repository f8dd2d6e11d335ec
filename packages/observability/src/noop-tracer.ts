import type {
  Tracer,
  TraceHandle,
  SpanHandle,
  GenerationHandle,
  TraceOptions,
  SpanOptions,
  GenerationOptions,
  UpdateData,
} from "./types.js";

// Shared handles: every call returns the same objects.

const NOOP_SPAN: SpanHandle = {
  update(_data: UpdateData): SpanHandle {
    return NOOP_SPAN;
  },
  end(): void {},
};

const NOOP_GENERATION: GenerationHandle = {
  update(_data: UpdateData): GenerationHandle {
    return NOOP_GENERATION;
  },
  end(): void {},
};

export const NOOP_TRACE: TraceHandle = {
  span(_options: SpanOptions): SpanHandle {
    return NOOP_SPAN;
  },
  generation(_options: GenerationOptions): GenerationHandle {
    return NOOP_GENERATION;
  },
  update(_data: UpdateData): TraceHandle {
    return NOOP_TRACE;
  },
  end(): void {},
};

/** Tracer used when Langfuse keys are not configured. */
export function createNoopTracer(): Tracer {
  return {
    trace(_options: TraceOptions): TraceHandle {
      return NOOP_TRACE;
    },
    async flush(): Promise<void> {},
    async shutdown(): Promise<void> {},
    isRemote: false,
  };
}
