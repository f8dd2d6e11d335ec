import { NodeSDK } from "@opentelemetry/sdk-node";
import { LangfuseSpanProcessor } from "@langfuse/otel";
import { startObservation } from "@langfuse/tracing";
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

export interface LangfuseTracerConfig {
  publicKey: string;
  secretKey: string;
  baseUrl: string;
}

type Observation = ReturnType<typeof startObservation>;

function wrapSpan(obs: Observation): SpanHandle {
  return {
    update(data: UpdateData): SpanHandle {
      obs.update({ output: data.output, metadata: data.metadata });
      return this;
    },
    end(): void {
      obs.end();
    },
  };
}

function wrapGeneration(obs: Observation): GenerationHandle {
  return {
    update(data: UpdateData): GenerationHandle {
      obs.update({
        output: data.output,
        metadata: data.metadata,
        ...(data.usage && {
          usageDetails: {
            input: data.usage.input,
            output: data.usage.output,
            total: data.usage.total,
          },
        }),
      });
      return this;
    },
    end(): void {
      obs.end();
    },
  };
}

function wrapTrace(obs: Observation): TraceHandle {
  return {
    span(options: SpanOptions): SpanHandle {
      return wrapSpan(
        obs.startObservation(options.name, {
          input: options.input,
          metadata: options.metadata,
        }),
      );
    },
    generation(options: GenerationOptions): GenerationHandle {
      return wrapGeneration(
        obs.startObservation(
          options.name,
          { model: options.model, input: options.input, metadata: options.metadata },
          { asType: "generation" },
        ),
      );
    },
    update(data: UpdateData): TraceHandle {
      obs.update({ output: data.output, metadata: data.metadata });
      return this;
    },
    end(): void {
      obs.end();
    },
  };
}

/**
 * Langfuse-backed tracer. Starts an OpenTelemetry NodeSDK whose span processor
 * exports to Langfuse; call `shutdown()` on process exit to flush.
 */
export function createLangfuseTracer(config: LangfuseTracerConfig): Tracer {
  const processor = new LangfuseSpanProcessor({
    publicKey: config.publicKey,
    secretKey: config.secretKey,
    baseUrl: config.baseUrl,
  });

  const sdk = new NodeSDK({ spanProcessors: [processor] });
  sdk.start();

  return {
    trace(options: TraceOptions): TraceHandle {
      const obs = startObservation(options.name, {
        input: options.input,
        metadata: options.metadata,
      });

      // userId and tags are trace-level attributes in Langfuse v4
      if (options.userId || options.tags) {
        obs.updateTrace({
          ...(options.userId && { userId: options.userId }),
          ...(options.tags && { tags: options.tags }),
        });
      }

      return wrapTrace(obs);
    },

    async flush(): Promise<void> {
      await processor.forceFlush();
    },

    async shutdown(): Promise<void> {
      await sdk.shutdown();
    },

    isRemote: true,
  };
}
