/**
 * Detector Module
 * Picks the row type of a source row
 */

import { isBlank } from "../utils/cell-value";
import type { RowTypeDefinition, SourceRow } from "../types";

/**
 * First row type, in declaration order, whose detection column is present
 * and non-empty. Later row types are ignored even if they match too.
 */
export function detectRowType(
  row: SourceRow,
  rowTypes: readonly RowTypeDefinition[],
): RowTypeDefinition | undefined {
  return rowTypes.find(
    (rowType) => row.has(rowType.detectionColumn) && !isBlank(row.get(rowType.detectionColumn)),
  );
}
