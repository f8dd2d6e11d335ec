import { NOOP_TRACE } from "@ragweave/observability";
import type { ObservationParent } from "@ragweave/observability";

/** Per-call context threaded through every stage. */
export interface RunContext {
  trace: ObservationParent;
}

export const NOOP_RUN: RunContext = { trace: NOOP_TRACE };

export type Stage<I, O> = (input: I, run: RunContext) => O | Promise<O>;

async function runStage<I, O>(
  name: string,
  stage: Stage<I, O>,
  input: I,
  run: RunContext,
): Promise<O> {
  const span = run.trace.span({ name });
  try {
    return await stage(input, run);
  } catch (error) {
    span.update({ metadata: { error: error instanceof Error ? error.message : String(error) } });
    throw error;
  } finally {
    span.end();
  }
}

/**
 * Ordered list of named stages. Built fresh per call and stateless; each stage
 * runs inside its own span of the call's trace.
 *
 * ```ts
 * const chunkPipeline = Pipeline.from("clean", cleanDocuments)
 *   .pipe("chunk", (docs) => splitter.splitDocuments(docs))
 *   .pipe("upsert", (docs) => store.upsert(docs, namespace));
 * ```
 */
export class Pipeline<I, O> {
  private constructor(
    readonly stageNames: readonly string[],
    private readonly execute: (input: I, run: RunContext) => Promise<O>,
  ) {}

  static from<I, O>(name: string, stage: Stage<I, O>): Pipeline<I, O> {
    return new Pipeline<I, O>([name], (input, run) => runStage(name, stage, input, run));
  }

  pipe<N>(name: string, stage: Stage<O, N>): Pipeline<I, N> {
    return this.andThen(Pipeline.from(name, stage));
  }

  /** Append every stage of `next`. */
  andThen<N>(next: Pipeline<O, N>): Pipeline<I, N> {
    return new Pipeline<I, N>([...this.stageNames, ...next.stageNames], async (input, run) =>
      next.execute(await this.execute(input, run), run),
    );
  }

  invoke(input: I, run: RunContext = NOOP_RUN): Promise<O> {
    return this.execute(input, run);
  }

  /** Run every input concurrently; rejects with the first failure. */
  batch(inputs: readonly I[], run: RunContext = NOOP_RUN): Promise<O[]> {
    return Promise.all(inputs.map((input) => this.execute(input, run)));
  }
}

/** Stage choosing, per input, the sub-pipeline that processes it. */
export function route<I, O>(
  name: string,
  select: (input: I, run: RunContext) => Pipeline<I, O> | Promise<Pipeline<I, O>>,
): Pipeline<I, O> {
  return Pipeline.from(name, async (input: I, run) => (await select(input, run)).invoke(input, run));
}

/**
 * Run two pipelines on the same input. Both always settle; if either rejects, the
 * combined call rejects with the first rejection once both are done.
 */
export function fanOut<I, A, B>(
  name: string,
  left: Pipeline<I, A>,
  right: Pipeline<I, B>,
): Pipeline<I, [A, B]> {
  return Pipeline.from(name, async (input: I, run): Promise<[A, B]> => {
    const [a, b] = await Promise.allSettled([left.invoke(input, run), right.invoke(input, run)]);
    if (a.status === "rejected") throw a.reason;
    if (b.status === "rejected") throw b.reason;
    return [a.value, b.value];
  });
}
