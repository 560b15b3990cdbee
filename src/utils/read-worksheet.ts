/**
 * Worksheet Reader
 * Loads the first worksheet of a workbook into header-keyed rows
 */

import ExcelJS from "exceljs";
import { cellToString, isBlank, toCellValue } from "./cell-value";
import type { CellValue, WorksheetData } from "../types";

/**
 * Read the first worksheet of an .xlsx file
 *
 * Row 1 holds the headers (trimmed; a blank header becomes ""). Rows
 * whose cells are all empty or whitespace are left out. Short rows read as empty cells for the
 * missing columns, and a repeated header keeps the right-most column.
 *
 * @returns null when the workbook has no worksheet or the sheet is empty
 */
export async function readWorksheet(path: string): Promise<WorksheetData | null> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(path);

  const sheet = workbook.worksheets[0];
  if (!sheet || sheet.rowCount === 0) {
    return null;
  }

  const headerRow = sheet.getRow(1);
  const headers: string[] = [];
  for (let col = 1; col <= headerRow.cellCount; col++) {
    headers.push(cellToString(toCellValue(headerRow.getCell(col).value)));
  }

  const data: WorksheetData = { headers, rows: [], rowNumbers: [] };

  for (let rowNumber = 2; rowNumber <= sheet.rowCount; rowNumber++) {
    const row = sheet.getRow(rowNumber);
    if (!row.hasValues) continue; // Blank row

    const values = new Map<string, CellValue>();
    headers.forEach((header, index) => {
      values.set(header, toCellValue(row.getCell(index + 1).value));
    });
    if ([...values.values()].every((cell) => isBlank(cell))) continue;

    data.rows.push(values);
    data.rowNumbers.push(rowNumber);
  }

  return data;
}

