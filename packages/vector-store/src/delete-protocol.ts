import type { MetadataFilter } from "@ragweave/types";
import { InvalidArgumentError } from "@ragweave/errors";
import type { Logger } from "@ragweave/logger";
import type { DeleteParams } from "./vector-store.interface.js";

/** Ceiling on matches collected by one emulated filter delete. */
export const FILTER_DELETE_TOP_K = 1000;
/** Ids per delete request. */
export const DELETE_BATCH_SIZE = 1000;

export interface DeleteOperations {
  deleteIds(ids: string[], namespace: string): Promise<void>;
  deleteNamespace(namespace: string): Promise<void>;
  /** Native delete-by-filter; absent when the backend only deletes by id. */
  deleteByFilter?(filter: MetadataFilter, namespace: string): Promise<void>;
  /** Ids of up to `limit` vectors in `namespace` matching `filter`, in any order. */
  matchIds(filter: MetadataFilter, namespace: string, limit: number): Promise<string[]>;
}

export async function deleteIdsInBatches(
  ops: Pick<DeleteOperations, "deleteIds">,
  ids: readonly string[],
  namespace: string,
): Promise<void> {
  for (let i = 0; i < ids.length; i += DELETE_BATCH_SIZE) {
    await ops.deleteIds(ids.slice(i, i + DELETE_BATCH_SIZE), namespace);
  }
}

/**
 * Delete-by-filter for backends without native support: collect the ids of at
 * most {@link FILTER_DELETE_TOP_K} matches and delete them by id.
 *
 * Best-effort: a filter matching more vectors than the ceiling leaves the rest
 * in place. Callers needing exhaustive deletion repeat the call until it deletes
 * nothing, or use `deleteAll`. Returns the number of ids deleted.
 */
export async function emulateFilterDelete(
  ops: Pick<DeleteOperations, "deleteIds" | "matchIds">,
  filter: MetadataFilter,
  namespace: string,
  logger?: Logger,
): Promise<number> {
  const ids = await ops.matchIds(filter, namespace, FILTER_DELETE_TOP_K);
  if (ids.length === 0) {
    return 0;
  }

  if (ids.length >= FILTER_DELETE_TOP_K) {
    logger?.warn(
      { namespace, matched: ids.length },
      "Filter delete reached the match ceiling; more vectors may match",
    );
  }

  await deleteIdsInBatches(ops, ids, namespace);
  return ids.length;
}

/**
 * Dispatch a delete request. `deleteAll` wins over `ids`, which win over `filter`;
 * an empty id list or filter counts as absent.
 */
export async function executeDelete(
  params: DeleteParams,
  namespace: string,
  ops: DeleteOperations,
  logger?: Logger,
): Promise<void> {
  if (params.deleteAll) {
    await ops.deleteNamespace(namespace);
    return;
  }

  if (params.ids && params.ids.length > 0) {
    await deleteIdsInBatches(ops, params.ids, namespace);
    return;
  }

  if (params.filter && Object.keys(params.filter).length > 0) {
    if (ops.deleteByFilter) {
      await ops.deleteByFilter(params.filter, namespace);
    } else {
      await emulateFilterDelete(ops, params.filter, namespace, logger);
    }
    return;
  }

  throw new InvalidArgumentError("Delete requires one of ids, deleteAll or filter");
}
