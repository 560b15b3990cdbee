/**
 * Conversion context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { ConverterConfig } from "./config";
import type { LutIndex, OutputDocument } from "./rows";
import type { Logger } from "../utils/logger";
import type { Tracker } from "../utils/tracker";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  ValidationIssue,
  LookupIssue,
  RowIssue,
  FileIssue,
  RowIssueReason,
  FileIssueReason,
  ProcessingStats,
} from "../utils/tracker";

export interface ConversionContext {
  // Input - provided at initialization
  config: ConverterConfig;
  logger: Logger;

  // Unified tracking for counters and issues
  tracker: Tracker;

  lut?: LutIndex; // Loaded once, read-only afterwards
  document: OutputDocument; // Owned by the orchestrator
}
