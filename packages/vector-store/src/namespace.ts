import type { NamespaceIsolation } from "@ragweave/types";
import { InvalidArgumentError } from "@ragweave/errors";

export const DEFAULT_NAMESPACE = "default";

/**
 * The namespace every vector-store call runs under. A missing namespace is
 * rejected when isolation is required and mapped to {@link DEFAULT_NAMESPACE}
 * otherwise.
 */
export function resolveNamespace(
  namespace: string | undefined,
  isolation: NamespaceIsolation,
): string {
  if (namespace !== undefined && namespace.length > 0) {
    return namespace;
  }
  if (isolation === "required") {
    throw new InvalidArgumentError("A namespace is required for vector-store operations");
  }
  return DEFAULT_NAMESPACE;
}
