/**
 * Merger Module
 * Adds the matching lookup-table columns to a source row
 */

import { cellToString } from "../utils/cell-value";
import type { Logger } from "../utils/logger";
import type { CellValue, LookupSpec, LutIndex, SourceRow } from "../types";

export type MergeOutcome = "not-required" | "no-join-key" | "miss" | "merged";

export interface MergeResult {
  row: SourceRow;
  outcome: MergeOutcome;
  /** Trimmed join key, when the row had one */
  key?: string;
}

/**
 * Merge LUT data into a row under `prefix`
 *
 * None of the failure cases are fatal: the row comes back unmerged and the
 * outcome says why.
 *
 * @example
 * // row { "Admission ID": "P001", Q1: 3 }, LUT "P001" → { Gender: "Male" }
 * mergeLutData(row, lut, { required: true, joinColumn: "Admission ID", columns: ["Gender"] }, "__LUT__", logger)
 * // row { "Admission ID": "P001", Q1: 3, "__LUT__Gender": "Male" }
 */
export function mergeLutData(
  row: SourceRow,
  lut: LutIndex,
  lookup: LookupSpec | undefined,
  prefix: string,
  logger: Logger,
): MergeResult {
  if (!lookup?.required) {
    return { row, outcome: "not-required" };
  }

  const key = cellToString(row.get(lookup.joinColumn));
  if (key === "") {
    logger.warn(`Join column '${lookup.joinColumn}' not found or empty in row`);
    return { row, outcome: "no-join-key" };
  }

  const lutRow = lut.records.get(key);
  if (!lutRow) {
    logger.error(`No LUT record found for ${lookup.joinColumn}='${key}'`, key);
    return { row, outcome: "miss", key };
  }

  const merged = new Map<string, CellValue>(row);
  for (const column of lookup.columns) {
    const value = lutRow.get(column);
    if (value === undefined) continue; // Not a LUT header

    const prefixed = `${prefix}${column}`;
    merged.set(prefixed, value);
    logger.debug(`Merged LUT column: ${column} → ${prefixed} = ${cellToString(value)}`, key);
  }

  return { row: merged, outcome: "merged", key };
}
