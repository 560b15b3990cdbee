/**
 * Central type exports
 */

// Configuration
export type {
  ConverterConfig,
  ConversionRule,
  FieldMapping,
  LookupSpec,
  RowTypeDefinition,
  OutputTemplates,
  RawConfig,
  PartialRawConfig,
  ConfigLayer,
  ParsedRawConfig,
  RawRowTypeSection,
  RawLookupSection,
} from "./config";
export {
  RawConfigSchema,
  PartialRawConfigSchema,
  ConfigLayerSchema,
  ROW_TYPE_META_KEYS,
  LOOKUP_META_KEYS,
} from "./config";

// Rows and documents
export type {
  CellValue,
  SourceRow,
  LutIndex,
  OutputElement,
  OutputRecord,
  OutputDocument,
  WorksheetData,
} from "./rows";

// Logging
export type { LogLevel, LogEvent, LogSink } from "./logging";
export { LOG_LEVELS } from "./logging";

// Context
export type {
  ConversionContext,
  Issue,
  IssueType,
  ValidationIssue,
  LookupIssue,
  RowIssue,
  FileIssue,
  RowIssueReason,
  FileIssueReason,
  ProcessingStats,
} from "./context";
