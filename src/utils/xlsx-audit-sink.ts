/**
 * XLSX Audit Sink
 * Collects log events into a spreadsheet that opens directly in Excel
 */

import ExcelJS from "exceljs";
import { mkdir } from "fs/promises";
import { dirname } from "node:path";
import type { Fill, Font, Worksheet } from "exceljs";
import type { LogEvent, LogLevel, LogSink } from "../types";

const HEADERS = ["Timestamp", "Level", "Record ID", "Message"];

function solidFill(argb: string): Fill {
  return { type: "pattern", pattern: "solid", fgColor: { argb } };
}

const LEVEL_STYLES: Partial<Record<LogLevel, { fill: Fill; font: Partial<Font> }>> = {
  error: { fill: solidFill("FFFFE6E6"), font: { color: { argb: "FFCC0000" }, bold: true } },
  warn: { fill: solidFill("FFFFF4E6"), font: { color: { argb: "FFFF8800" } } },
};

/**
 * Rows are kept in memory and the workbook is written on `close()`
 */
export class XlsxAuditSink implements LogSink {
  private workbook = new ExcelJS.Workbook();
  private sheet: Worksheet;

  constructor(readonly path: string) {
    this.workbook.created = new Date();
    this.sheet = this.workbook.addWorksheet("Log", {
      views: [{ state: "frozen", ySplit: 1 }],
    });

    this.sheet.columns = [
      { header: HEADERS[0], key: "timestamp", width: 20, style: { numFmt: "yyyy-mm-dd hh:mm:ss" } },
      { header: HEADERS[1], key: "level", width: 10 },
      { header: HEADERS[2], key: "recordId", width: 15 },
      { header: HEADERS[3], key: "message", width: 100 },
    ];

    const header = this.sheet.getRow(1);
    header.font = { bold: true };
    header.alignment = { horizontal: "center", vertical: "middle" };
    header.eachCell((cell) => {
      cell.fill = solidFill("FFD3D3D3");
    });
  }

  get rowCount(): number {
    return this.sheet.rowCount - 1;
  }

  write(event: LogEvent): void {
    const row = this.sheet.addRow({
      timestamp: event.timestamp,
      level: event.level.toUpperCase(),
      recordId: event.recordId ?? "",
      message: event.message,
    });

    const style = LEVEL_STYLES[event.level];
    if (style) {
      row.eachCell({ includeEmpty: true }, (cell) => {
        cell.fill = style.fill;
        cell.font = style.font;
      });
    }
  }

  async close(): Promise<void> {
    this.sheet.autoFilter = {
      from: { row: 1, column: 1 },
      to: { row: this.sheet.rowCount, column: HEADERS.length },
    };
    await mkdir(dirname(this.path), { recursive: true });
    await this.workbook.xlsx.writeFile(this.path);
  }
}
