/**
 * Conversion Tracker
 * Unified tracking for row counters and issues
 */

// ============================================================================
// Types
// ============================================================================

export type RowIssueReason = "no-row-type" | "missing-required-field";
export type FileIssueReason = "empty-file" | "read-error";

// Discriminated union - each type has its own fields
export interface ValidationIssue {
  type: "validation";
  path: string;
  row: number;
  field: string;
  value: string;
  pattern: string;
}

export interface LookupIssue {
  type: "lookup-miss";
  path: string;
  row: number;
  key: string;
}

export interface RowIssue {
  type: "row";
  path: string;
  row: number;
  reason: RowIssueReason;
  details?: string;
}

export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details?: string;
}

export type Issue = ValidationIssue | LookupIssue | RowIssue | FileIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  // File counts
  totalFiles: number;
  processedFiles: number;
  emptyFiles: number;
  failedFiles: number;

  // Row counts
  convertedRows: number;
  skippedRows: number;

  // LUT counts
  lutRecords: number;
  lookupMisses: number;

  // All issues
  issues: Issue[];

  // Timing
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

function mapFileError(error: unknown): { reason: FileIssueReason; details: string } {
  const details = error instanceof Error ? error.message : String(error);
  return { reason: "read-error", details };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalFiles = 0;
  private processedFiles = 0;
  private emptyFiles = 0;
  private failedFiles = 0;
  private convertedRows = 0;
  private skippedRows = 0;
  private lutRecords = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalFiles(count: number): void {
    this.totalFiles = count;
  }

  setLutRecords(count: number): void {
    this.lutRecords = count;
  }

  incrementProcessed(): void {
    this.processedFiles++;
  }

  incrementConverted(): void {
    this.convertedRows++;
  }

  get converted(): number {
    return this.convertedRows;
  }

  get skipped(): number {
    return this.skippedRows;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Count a row as skipped and record why
   */
  trackSkippedRow(
    path: string,
    row: number,
    reason: RowIssueReason,
    details?: string,
  ): void {
    this.skippedRows++;
    this.issues.push({ type: "row", path, row, reason, details });
  }

  trackEmptyFile(path: string): void {
    this.emptyFiles++;
    this.issues.push({ type: "file", path, reason: "empty-file" });
  }

  /**
   * Track an unreadable input file from its error
   */
  trackFileError(path: string, error: unknown): void {
    this.failedFiles++;
    const { reason, details } = mapFileError(error);
    this.issues.push({ type: "file", path, reason, details });
  }

  trackValidation(
    path: string,
    row: number,
    failure: { field: string; value: string; pattern: string },
  ): void {
    this.issues.push({
      type: "validation",
      path,
      row,
      field: failure.field,
      value: failure.value,
      pattern: failure.pattern,
    });
  }

  trackLookupMiss(path: string, row: number, key: string): void {
    this.issues.push({ type: "lookup-miss", path, row, key });
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues<T extends IssueType>(type: T): Extract<Issue, { type: T }>[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  /**
   * Get final processing statistics
   */
  getStats(): ProcessingStats {
    const endTime = new Date();
    const duration = endTime.getTime() - this.startTime.getTime();

    return {
      totalFiles: this.totalFiles,
      processedFiles: this.processedFiles,
      emptyFiles: this.emptyFiles,
      failedFiles: this.failedFiles,
      convertedRows: this.convertedRows,
      skippedRows: this.skippedRows,
      lutRecords: this.lutRecords,
      lookupMisses: this.getIssues("lookup-miss").length,
      issues: this.issues,
      duration,
    };
  }
}
