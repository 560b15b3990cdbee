import { describe, it, expect, vi, afterEach } from "vitest";
import { formatDuration, stats } from "./stats";
import { Tracker } from "../utils/tracker";

describe("formatDuration", () => {
  it("formats milliseconds, seconds and minutes", () => {
    expect(formatDuration(500)).toBe("500ms");
    expect(formatDuration(1500)).toBe("1.50s");
    expect(formatDuration(125000)).toBe("2m 5s");
  });
});

describe("stats", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function capture(tracker: Tracker, verbose = false): string {
    const lines: string[] = [];
    vi.spyOn(console, "log").mockImplementation((line: unknown) => {
      lines.push(String(line));
    });
    stats(tracker, { verbose, outputFile: "out.xml" });
    return lines.join("\n");
  }

  it("shows counters and the output file", () => {
    const tracker = new Tracker();
    tracker.incrementProcessed();
    tracker.incrementConverted();

    const output = capture(tracker);

    expect(output).toContain("Conversion Complete");
    expect(output).toContain("Converted");
    expect(output).toContain("out.xml");
    expect(output).not.toContain("Issues");
  });

  it("lists issues when verbose", () => {
    const tracker = new Tracker();
    tracker.trackLookupMiss("a.xlsx", 2, "1003");
    tracker.trackSkippedRow("a.xlsx", 5, "missing-required-field", "missing DATUMINVUL");

    const output = capture(tracker, true);

    expect(output).toContain("LUT misses");
    expect(output).toContain("a.xlsx:2 1003");
    expect(output).toContain("missing DATUMINVUL");
  });
});
