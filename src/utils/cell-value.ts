/**
 * Cell Value Utilities
 * Resolve raw exceljs cell values into the CellValue variant
 */

import type { CellRichTextValue, CellValue as ExcelCellValue } from "exceljs";
import type { CellValue } from "../types";

// exceljs declares hyperlink text as a string, but a styled link reads back as rich text
type RawCellValue = ExcelCellValue | { text: CellRichTextValue; hyperlink: string; tooltip?: string };

export const EMPTY: CellValue = { kind: "empty" };

export function text(value: string): CellValue {
  return { kind: "text", text: value };
}

/**
 * Resolve a raw cell value
 *
 * Formula cells resolve to their cached result, rich text is concatenated,
 * hyperlinks use their display text and error cells are empty.
 */
export function toCellValue(raw: RawCellValue): CellValue {
  if (raw === null || raw === undefined) {
    return EMPTY;
  }
  if (typeof raw === "string") {
    return text(raw);
  }
  if (typeof raw === "number") {
    return { kind: "number", value: raw };
  }
  if (typeof raw === "boolean") {
    return text(raw ? "True" : "False");
  }
  if (raw instanceof Date) {
    return Number.isNaN(raw.getTime()) ? EMPTY : { kind: "date", value: raw };
  }
  if ("richText" in raw) {
    return text(raw.richText.map((part) => part.text).join(""));
  }
  if ("hyperlink" in raw) {
    return toCellValue(raw.text);
  }
  if ("formula" in raw || "sharedFormula" in raw) {
    const result = raw.result;
    if (result === undefined || (typeof result === "object" && !(result instanceof Date))) {
      return EMPTY;
    }
    return toCellValue(result);
  }
  return EMPTY;
}

/**
 * Format a date as YYYY-MM-DD
 *
 * Spreadsheet dates carry no time zone; exceljs hands them over as UTC.
 */
export function formatDate(value: Date): string {
  return value.toISOString().slice(0, 10);
}

/**
 * String form of a cell, trimmed. Empty cells become ""
 */
export function cellToString(cell: CellValue | undefined): string {
  if (!cell) return "";
  switch (cell.kind) {
    case "text":
      return cell.text.trim();
    case "number":
      return String(cell.value);
    case "date":
      return formatDate(cell.value);
    case "empty":
      return "";
  }
}

export function isBlank(cell: CellValue | undefined): boolean {
  return cellToString(cell) === "";
}
