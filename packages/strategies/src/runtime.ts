import { InvalidArgumentError } from "@ragweave/errors";
import {
  applySystemMetadata,
  stripUntrustedMetadata,
  systemMetadataFor,
  validateMetadataFilter,
  type RunContext,
} from "@ragweave/core";
import { createChildLogger, type Logger } from "@ragweave/logger";
import { buildRunConfig, runTraced, type RunMethod } from "@ragweave/observability";
import {
  FILE_ID_KEY,
  PROJECT_ID_KEY,
  USER_ID_KEY,
  type DeindexOptions,
  type Document,
  type IndexAcknowledgement,
  type IndexOptions,
  type MetadataFilter,
  type ReservedMetadataKey,
  type StrategyId,
} from "@ragweave/types";
import { resolveNamespace } from "@ragweave/vector-store";
import type { StrategyDependencies } from "./dependencies.js";

export function emptyAcknowledgement(): IndexAcknowledgement {
  return { documents: 0, chunkIds: [], summaryIds: [] };
}

/**
 * Behavior every strategy shares: namespace resolution, one trace per call
 * tagged with the strategy id, metadata hygiene and the default deindex.
 */
export class StrategyRuntime {
  readonly logger: Logger;

  constructor(
    readonly id: StrategyId,
    readonly deps: StrategyDependencies,
  ) {
    this.logger = createChildLogger(deps.logger, { component: "strategy", strategyId: id });
  }

  namespace(namespace: string | undefined): string {
    return resolveNamespace(namespace, this.deps.isolation);
  }

  traced<T>(
    method: RunMethod,
    namespace: string,
    input: unknown,
    fn: (run: RunContext) => Promise<T>,
  ): Promise<T> {
    const config = buildRunConfig(this.id, method, namespace);
    return runTraced(this.deps.tracer, config, input, (trace) => fn({ trace }));
  }

  /** Documents ready for indexing: reserved user keys dropped, system keys applied. */
  prepare(documents: readonly Document[], namespace: string, options: IndexOptions): Document[] {
    return applySystemMetadata(documents, systemMetadataFor(namespace, options.metadata));
  }

  assertQuery(query: string): void {
    if (query.trim().length === 0) {
      throw new InvalidArgumentError("Query must be a non-empty string");
    }
  }

  filters(filters: unknown): MetadataFilter {
    return validateMetadataFilter(filters);
  }

  /** Search hits as caller-facing documents, with untrusted reserved values removed. */
  present(hits: readonly Document[], namespace: string, filter: MetadataFilter): Document[] {
    const trusted: Partial<Record<ReservedMetadataKey, string>> = { [USER_ID_KEY]: namespace };
    for (const key of [PROJECT_ID_KEY, FILE_ID_KEY] as const) {
      const value = filter[key];
      if (typeof value === "string") trusted[key] = value;
    }
    const documents = hits.map(({ id, content, metadata }) => ({ id, content, metadata }));
    return stripUntrustedMetadata(documents, trusted);
  }

  async deindex(options: DeindexOptions): Promise<void> {
    const namespace = this.namespace(options.namespace);
    const filter =
      options.filter === undefined ? undefined : validateMetadataFilter(options.filter);

    await this.traced("deindex", namespace, { ...options, namespace }, async () => {
      await this.deps.store.delete({
        ids: options.ids,
        deleteAll: options.deleteAll,
        namespace,
        filter,
      });
    });
    this.logger.info(
      { namespace, ids: options.ids?.length, deleteAll: options.deleteAll === true, filter },
      "Deindexed",
    );
  }
}
