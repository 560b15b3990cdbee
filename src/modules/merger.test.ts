import { describe, it, expect } from "vitest";
import { mergeLutData } from "./merger";
import { Logger } from "../utils/logger";
import type { CellValue, LogEvent, LookupSpec, LutIndex } from "../types";

function rowOf(values: Record<string, string>): Map<string, CellValue> {
  return new Map(
    Object.entries(values).map(([key, text]): [string, CellValue] => [key, { kind: "text", text }]),
  );
}

function createLogger() {
  const events: LogEvent[] = [];
  const logger = new Logger("info", [{ write: (event) => events.push(event) }]);
  return { events, logger };
}

const LUT: LutIndex = {
  joinColumn: "Patient ID",
  records: new Map([["1001", rowOf({ "Patient ID": "1001", Gender: "Male", DOB: "1960-05-01" })]]),
  loaded: 1,
  skipped: 0,
};

const LOOKUP: LookupSpec = { required: true, joinColumn: "Patient ID", columns: ["Gender", "Height"] };

describe("mergeLutData", () => {
  it("adds the requested columns under the prefix", () => {
    const { logger } = createLogger();
    const row = rowOf({ "Patient ID": " 1001 ", Q1: "3" });

    const result = mergeLutData(row, LUT, LOOKUP, "__LUT__", logger);

    expect(result.outcome).toBe("merged");
    expect(result.key).toBe("1001");
    expect([...result.row.keys()]).toEqual(["Patient ID", "Q1", "__LUT__Gender"]);
    expect(result.row.get("__LUT__Gender")).toEqual({ kind: "text", text: "Male" });
  });

  it("does not modify the source row", () => {
    const { logger } = createLogger();
    const row = rowOf({ "Patient ID": "1001" });

    mergeLutData(row, LUT, LOOKUP, "__LUT__", logger);

    expect(row.has("__LUT__Gender")).toBe(false);
  });

  it("overwrites a source column with the same prefixed name", () => {
    const { logger } = createLogger();
    const row = rowOf({ "Patient ID": "1001", __LUT__Gender: "stale" });

    const result = mergeLutData(row, LUT, LOOKUP, "__LUT__", logger);

    expect(result.row.get("__LUT__Gender")).toEqual({ kind: "text", text: "Male" });
  });

  it("matches a numeric join key to a text key", () => {
    const { logger } = createLogger();
    const row = new Map<string, CellValue>([["Patient ID", { kind: "number", value: 1001 }]]);

    expect(mergeLutData(row, LUT, LOOKUP, "__LUT__", logger).outcome).toBe("merged");
  });

  it("returns the row unchanged when the lookup is not required", () => {
    const { events, logger } = createLogger();
    const row = rowOf({ "Patient ID": "1001" });

    for (const lookup of [undefined, { ...LOOKUP, required: false }]) {
      const result = mergeLutData(row, LUT, lookup, "__LUT__", logger);
      expect(result).toEqual({ row, outcome: "not-required" });
    }
    expect(events).toEqual([]);
  });

  it("warns when the join column is empty", () => {
    const { events, logger } = createLogger();
    const row = rowOf({ "Patient ID": "" });

    const result = mergeLutData(row, LUT, LOOKUP, "__LUT__", logger);

    expect(result.outcome).toBe("no-join-key");
    expect(result.row).toBe(row);
    expect(events.map((e) => [e.level, e.message])).toEqual([
      ["warn", "Join column 'Patient ID' not found or empty in row"],
    ]);
  });

  it("logs a miss as an error and leaves the row unmerged", () => {
    const { events, logger } = createLogger();
    const row = rowOf({ "Patient ID": "P002" });

    const result = mergeLutData(row, LUT, LOOKUP, "__LUT__", logger);

    expect(result).toEqual({ row, outcome: "miss", key: "P002" });
    expect(events.map((e) => [e.level, e.message])).toEqual([
      ["error", "No LUT record found for Patient ID='P002'"],
    ]);
  });
});
