/**
 * Utility exports
 */

// Errors
export { ConfigurationError, PatternError, ValidationError } from "./errors";

// Cell utilities
export { cellToString, formatDate, isBlank, toCellValue } from "./cell-value";

// Conversion utilities
export { applyConversions, fullMatch, normalizePattern } from "./apply-conversions";
export type { ConversionResult } from "./apply-conversions";

// Schema element order
export {
  ELEMENT_ORDER,
  getElementOrder,
  REQUIRED_ELEMENTS,
} from "./element-order";

// Filesystem utilities
export { readWorksheet } from "./read-worksheet";
export { expandInputs } from "./expand-inputs";
export { expandTemplate } from "./expand-template";

// Config utilities
export {
  loadConfig,
  getDefaultConfigPath,
  getUserConfigPath,
} from "./load-config";
export { parseConfig } from "./parse-config";

// Logging
export { Logger, isLogLevelEnabled } from "./logger";
export { ConsoleSink } from "./console-sink";
export { TextFileSink, formatLogLine } from "./text-file-sink";
export { XlsxAuditSink } from "./xlsx-audit-sink";

// Classes
export { Tracker } from "./tracker";
