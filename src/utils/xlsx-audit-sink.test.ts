import { describe, it, expect, beforeEach, afterEach } from "vitest";
import ExcelJS from "exceljs";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { XlsxAuditSink } from "./xlsx-audit-sink";

describe("XlsxAuditSink", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "prom-audit-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes one row per event when closed", async () => {
    const path = join(dir, "audit", "run.xlsx");
    const sink = new XlsxAuditSink(path);
    const timestamp = new Date(2024, 2, 15, 8, 30, 5);

    sink.write({ level: "info", message: "Converted OKS questionnaire: UPNNUM=1001", timestamp, recordId: "1001" });
    sink.write({ level: "error", message: "No LUT record found for Patient ID='1003'", timestamp });
    expect(sink.rowCount).toBe(2);
    await sink.close();

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(path);
    const sheet = workbook.getWorksheet("Log");

    expect(sheet?.getRow(1).values).toEqual([undefined, "Timestamp", "Level", "Record ID", "Message"]);
    expect(sheet?.getRow(2).getCell(2).value).toBe("INFO");
    expect(sheet?.getRow(2).getCell(3).value).toBe("1001");
    expect(sheet?.getRow(3).getCell(2).value).toBe("ERROR");
    expect(sheet?.getRow(3).getCell(4).value).toBe("No LUT record found for Patient ID='1003'");
  });
});
