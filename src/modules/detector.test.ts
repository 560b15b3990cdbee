import { describe, it, expect } from "vitest";
import { detectRowType } from "./detector";
import type { CellValue, RowTypeDefinition } from "../types";

function rowOf(values: Record<string, string>): Map<string, CellValue> {
  return new Map(
    Object.entries(values).map(([key, text]): [string, CellValue] => [key, { kind: "text", text }]),
  );
}

const OKS: RowTypeDefinition = { name: "OKS", detectionColumn: "OKS Total", fields: [] };
const OHS: RowTypeDefinition = { name: "OHS", detectionColumn: "OHS Total", fields: [] };

describe("detectRowType", () => {
  it("picks the row type whose detection column has a value", () => {
    expect(detectRowType(rowOf({ "OHS Total": "40" }), [OKS, OHS])).toBe(OHS);
  });

  it("lets the first declared row type win", () => {
    const row = rowOf({ "OKS Total": "30", "OHS Total": "40" });
    expect(detectRowType(row, [OKS, OHS])).toBe(OKS);
    expect(detectRowType(row, [OHS, OKS])).toBe(OHS);
  });

  it("ignores blank detection columns", () => {
    const row = rowOf({ "OKS Total": "  ", "OHS Total": "40" });
    expect(detectRowType(row, [OKS, OHS])).toBe(OHS);
  });

  it("counts a zero score as present", () => {
    const row = new Map<string, CellValue>([["OKS Total", { kind: "number", value: 0 }]]);
    expect(detectRowType(row, [OKS, OHS])).toBe(OKS);
  });

  it("returns undefined when nothing matches", () => {
    expect(detectRowType(rowOf({ "Patient ID": "1001" }), [OKS, OHS])).toBeUndefined();
  });
});
