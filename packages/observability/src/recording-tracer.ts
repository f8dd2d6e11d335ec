import type {
  GenerationHandle,
  GenerationOptions,
  SpanHandle,
  SpanOptions,
  TraceHandle,
  TraceOptions,
  Tracer,
  UpdateData,
} from "./types.js";

export interface RecordedObservation {
  kind: "trace" | "span" | "generation";
  name: string;
  input?: unknown;
  metadata?: Record<string, unknown>;
  tags?: string[];
  updates: UpdateData[];
  ended: boolean;
  children: RecordedObservation[];
}

export interface RecordingTracer extends Tracer {
  readonly traces: RecordedObservation[];
}

function recordChild(
  parent: RecordedObservation,
  kind: "span" | "generation",
  options: SpanOptions | GenerationOptions,
): RecordedObservation {
  const child: RecordedObservation = {
    kind,
    name: options.name,
    input: options.input,
    metadata: options.metadata,
    updates: [],
    ended: false,
    children: [],
  };
  parent.children.push(child);
  return child;
}

function handleFor(record: RecordedObservation): SpanHandle & GenerationHandle {
  return {
    update(data: UpdateData) {
      record.updates.push(data);
      return this;
    },
    end(): void {
      record.ended = true;
    },
  };
}

/** In-process tracer that keeps every observation in memory. */
export function createRecordingTracer(): RecordingTracer {
  const traces: RecordedObservation[] = [];

  return {
    traces,
    trace(options: TraceOptions): TraceHandle {
      const record: RecordedObservation = {
        kind: "trace",
        name: options.name,
        input: options.input,
        metadata: options.metadata,
        tags: options.tags,
        updates: [],
        ended: false,
        children: [],
      };
      traces.push(record);

      const handle: TraceHandle = {
        span: (spanOptions) => handleFor(recordChild(record, "span", spanOptions)),
        generation: (genOptions) => handleFor(recordChild(record, "generation", genOptions)),
        update(data: UpdateData): TraceHandle {
          record.updates.push(data);
          return handle;
        },
        end(): void {
          record.ended = true;
        },
      };
      return handle;
    },
    async flush(): Promise<void> {},
    async shutdown(): Promise<void> {},
    isRemote: false,
  };
}
