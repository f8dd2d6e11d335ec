import type { Document, MetadataFilter, SystemMetadata } from "./document.js";
import type { StrategyId } from "./strategy.js";

export type JobType = "index" | "deindex";

export interface JobData {
  /** Namespace of the authenticated caller. */
  namespace: string;
  type: JobType;
  strategyId: string;
  strategyConfig: Record<string, unknown>;
}

export interface IndexJobData extends JobData {
  type: "index";
  documents: Document[];
  metadata?: SystemMetadata;
}

export interface DeindexJobData extends JobData {
  type: "deindex";
  ids?: string[];
  deleteAll?: boolean;
  filter?: MetadataFilter;
}

export type AnyJobData = IndexJobData | DeindexJobData;

export interface JobResult {
  success: boolean;
  strategyId: StrategyId;
  processedAt: Date;
  duration: number;
  metrics?: Record<string, number>;
}
