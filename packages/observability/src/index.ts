export type {
  Tracer,
  TraceHandle,
  SpanHandle,
  GenerationHandle,
  ObservationParent,
  TraceOptions,
  SpanOptions,
  GenerationOptions,
  UpdateData,
} from "./types.js";

export { createTracer } from "./factory.js";
export { createNoopTracer, NOOP_TRACE } from "./noop-tracer.js";
export { createLangfuseTracer } from "./langfuse-tracer.js";
export type { LangfuseTracerConfig } from "./langfuse-tracer.js";
export { buildRunConfig, runTraced } from "./run-config.js";
export type { RunConfig, RunMethod } from "./run-config.js";
