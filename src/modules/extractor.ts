/**
 * Extractor Module
 * Produces the converted element values of a row for its row type
 */

import { applyConversions } from "../utils/apply-conversions";
import { cellToString } from "../utils/cell-value";
import type { ValidationError } from "../utils/errors";
import type { Logger } from "../utils/logger";
import type { RowTypeDefinition, SourceRow } from "../types";

export interface ExtractionResult {
  elements: Map<string, string>;
  /** Fields left out because a validation rule rejected them */
  failures: ValidationError[];
}

/**
 * Extract every mapped element of `rowType` from a (LUT-merged) row
 *
 * Missing and empty source values are left out. Dates become YYYY-MM-DD
 * before conversion. A field that fails validation is left out and the
 * rest of the row is still extracted.
 */
export function extractElements(
  row: SourceRow,
  rowType: RowTypeDefinition,
  logger: Logger,
): ExtractionResult {
  const elements = new Map<string, string>();
  const failures: ValidationError[] = [];

  for (const field of rowType.fields) {
    const cell = row.get(field.sourceColumn);
    const raw = cellToString(cell);
    if (raw === "") continue;

    if (cell?.kind === "date") {
      logger.debug(`Converted datetime to date: ${field.outputName} = ${raw}`);
    }

    const result = applyConversions(raw, field.conversions, field.outputName, logger);
    if (result.ok) {
      elements.set(field.outputName, result.value);
    } else {
      logger.error(`Skipping element ${field.outputName}: ${result.error.message}`);
      failures.push(result.error);
    }
  }

  return { elements, failures };
}
