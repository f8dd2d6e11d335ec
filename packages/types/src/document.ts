export type DocumentMetadata = Record<string, unknown>;

export interface Document {
  /** Vector-store id; present on documents returned by a search. */
  id?: string;
  content: string;
  metadata: DocumentMetadata;
}

export const PROJECT_ID_KEY = "project_id";
export const FILE_ID_KEY = "file_id";
export const USER_ID_KEY = "user_id";
export const FILE_TITLE_KEY = "file_title";
export const IS_SUMMARY_KEY = "is_summary";

// Assigned by the system at ingestion; never taken from user metadata
export const RESERVED_METADATA_KEYS = [PROJECT_ID_KEY, FILE_ID_KEY, USER_ID_KEY] as const;

export type ReservedMetadataKey = (typeof RESERVED_METADATA_KEYS)[number];

export type SystemMetadata = Partial<Record<ReservedMetadataKey, string>> & DocumentMetadata;

export type MetadataFilterValue = string | number | boolean;

export type MetadataFilter = Record<string, MetadataFilterValue>;
