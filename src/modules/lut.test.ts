import { describe, it, expect, beforeEach, afterEach } from "vitest";
import ExcelJS from "exceljs";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadLut } from "./lut";
import { Logger } from "../utils/logger";
import { ConfigurationError } from "../utils/errors";
import type { LogEvent } from "../types";

type FixtureCell = string | number | Date | null;

async function writeWorkbook(path: string, rows: FixtureCell[][]): Promise<void> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet("Sheet1");
  for (const row of rows) {
    sheet.addRow(row);
  }
  await workbook.xlsx.writeFile(path);
}

describe("loadLut", () => {
  let dir: string;
  let events: LogEvent[];
  let logger: Logger;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "prom-lut-"));
    events = [];
    logger = new Logger("info", [{ write: (event) => events.push(event) }]);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("indexes rows by the trimmed join key", async () => {
    const path = join(dir, "lut.xlsx");
    await writeWorkbook(path, [
      ["Patient ID", "Gender", "Date of Birth"],
      ["1001", "Male", new Date(Date.UTC(1960, 4, 1))],
      [null, "Female", new Date(Date.UTC(1971, 0, 2))],
      [" 1002 ", "Female", null],
      [1003, "Male", null],
    ]);

    const lut = await loadLut(path, "Patient ID", logger);

    expect(lut.loaded).toBe(3);
    expect(lut.skipped).toBe(1);
    expect([...lut.records.keys()]).toEqual(["1001", "1002", "1003"]);
    expect(lut.records.get("1001")?.get("Gender")).toEqual({ kind: "text", text: "Male" });
    expect(lut.records.get("1001")?.get("Date of Birth")).toEqual({
      kind: "date",
      value: new Date(Date.UTC(1960, 4, 1)),
    });
    expect(events.map((e) => e.message)).toEqual([
      `Loading LUT: ${path}`,
      "LUT loaded: 3 records indexed by 'Patient ID' (1 skipped)",
    ]);
  });

  it("lets a repeated key keep the later row", async () => {
    const path = join(dir, "lut.xlsx");
    await writeWorkbook(path, [
      ["Patient ID", "Gender"],
      ["1001", "Male"],
      ["1001", "Female"],
    ]);

    const lut = await loadLut(path, "Patient ID", logger);

    expect(lut.records.get("1001")?.get("Gender")).toEqual({ kind: "text", text: "Female" });
  });

  it("fails when the join column is missing", async () => {
    const path = join(dir, "lut.xlsx");
    await writeWorkbook(path, [
      ["MRN", "Gender"],
      ["1001", "Male"],
    ]);

    const result = loadLut(path, "Patient ID", logger);

    await expect(result).rejects.toBeInstanceOf(ConfigurationError);
    await expect(result).rejects.toThrow(
      `LUT join column 'Patient ID' not found in ${path}. Available columns: 'MRN', 'Gender'`,
    );
  });

  it("returns an empty index for an empty sheet", async () => {
    const path = join(dir, "lut.xlsx");
    await writeWorkbook(path, []);

    const lut = await loadLut(path, "Patient ID", logger);

    expect(lut.records.size).toBe(0);
    expect(events.map((e) => e.level)).toEqual(["info", "warn"]);
  });
});
