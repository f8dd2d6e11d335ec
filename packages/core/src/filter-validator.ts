import { InvalidArgumentError } from "@ragweave/errors";
import type { MetadataFilter } from "@ragweave/types";

const FILTER_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/;

/**
 * Validate a caller-supplied metadata filter. Keys become payload paths in the
 * vector store, so only plain identifiers are accepted; values must be scalars.
 */
export function validateMetadataFilter(filter: unknown): MetadataFilter {
  if (filter === undefined || filter === null) return {};

  if (typeof filter !== "object" || Array.isArray(filter)) {
    throw new InvalidArgumentError("Metadata filter must be a plain object");
  }

  const validated: MetadataFilter = {};
  for (const [key, value] of Object.entries(filter)) {
    if (!FILTER_KEY_PATTERN.test(key)) {
      throw new InvalidArgumentError(`Invalid filter field: "${key}"`);
    }
    if (typeof value === "string" || typeof value === "boolean") {
      validated[key] = value;
    } else if (typeof value === "number" && Number.isFinite(value)) {
      validated[key] = value;
    } else {
      throw new InvalidArgumentError(
        `Filter field "${key}" must be a string, finite number or boolean`,
      );
    }
  }
  return validated;
}

/** Caller filter plus scope keys; scope wins on conflict. */
export function mergeFilters(
  filter: MetadataFilter | undefined,
  scope: MetadataFilter,
): MetadataFilter {
  return { ...validateMetadataFilter(filter), ...scope };
}
