/**
 * Tracer abstraction over Langfuse v4 (OpenTelemetry based).
 *
 * Strategies receive a {@link Tracer} and open one trace per index/invoke/deindex
 * call; pipeline stages open child spans, model calls open generations.
 */

export interface TraceOptions {
  name: string;
  input?: unknown;
  metadata?: Record<string, unknown>;
  tags?: string[];
  userId?: string;
}

export interface SpanOptions {
  name: string;
  input?: unknown;
  metadata?: Record<string, unknown>;
}

export interface GenerationOptions {
  name: string;
  model?: string;
  input?: unknown;
  metadata?: Record<string, unknown>;
}

export interface UpdateData {
  output?: unknown;
  usage?: {
    input?: number;
    output?: number;
    total?: number;
  };
  metadata?: Record<string, unknown>;
}

export interface SpanHandle {
  update(data: UpdateData): SpanHandle;
  end(): void;
}

export interface GenerationHandle {
  update(data: UpdateData): GenerationHandle;
  end(): void;
}

/** Parent observation that can hold child spans and generations. */
export interface ObservationParent {
  span(options: SpanOptions): SpanHandle;
  generation(options: GenerationOptions): GenerationHandle;
}

export interface TraceHandle extends ObservationParent {
  update(data: UpdateData): TraceHandle;
  end(): void;
}

export interface Tracer {
  trace(options: TraceOptions): TraceHandle;
  flush(): Promise<void>;
  shutdown(): Promise<void>;
  /** Whether this tracer sends data to a remote service */
  readonly isRemote: boolean;
}
