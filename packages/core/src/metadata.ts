import { RESERVED_METADATA_KEYS, USER_ID_KEY } from "@ragweave/types";
import type { Document, DocumentMetadata, ReservedMetadataKey, SystemMetadata } from "@ragweave/types";

const RESERVED = new Set<string>(RESERVED_METADATA_KEYS);

function isReservedKey(key: string): key is ReservedMetadataKey {
  return RESERVED.has(key);
}

/** Drop reserved keys from user metadata, then lay system metadata over it. */
export function sanitizeMetadata(
  userMetadata: DocumentMetadata,
  systemMetadata: SystemMetadata = {},
): DocumentMetadata {
  const sanitized: DocumentMetadata = {};
  for (const [key, value] of Object.entries(userMetadata)) {
    if (!isReservedKey(key)) sanitized[key] = value;
  }
  return { ...sanitized, ...systemMetadata };
}

/**
 * System metadata for an `index()` call: the caller's metadata with the tenant
 * id forced to the namespace.
 */
export function systemMetadataFor(namespace: string, metadata: SystemMetadata = {}): SystemMetadata {
  return { ...metadata, [USER_ID_KEY]: namespace };
}

export function applySystemMetadata(
  documents: readonly Document[],
  systemMetadata: SystemMetadata,
): Document[] {
  return documents.map((document) => ({
    ...document,
    metadata: sanitizeMetadata(document.metadata, systemMetadata),
  }));
}

/**
 * Remove reserved keys whose value differs from the trusted, system-assigned
 * value. Keys without a trusted value are kept: they were written by
 * {@link sanitizeMetadata} at index time.
 */
export function stripUntrustedMetadata(
  documents: readonly Document[],
  trusted: Partial<Record<ReservedMetadataKey, string>>,
): Document[] {
  return documents.map((document) => {
    const metadata: DocumentMetadata = {};
    for (const [key, value] of Object.entries(document.metadata)) {
      if (isReservedKey(key)) {
        const expected = trusted[key];
        if (expected !== undefined && value !== expected) continue;
      }
      metadata[key] = value;
    }
    return { ...document, metadata };
  });
}
