import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { expandInputs } from "./expand-inputs";
import { Logger } from "./logger";
import type { LogEvent } from "../types";

describe("expandInputs", () => {
  let dir: string;
  let events: LogEvent[];
  let logger: Logger;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "prom-inputs-"));
    events = [];
    logger = new Logger("info", [{ write: (event) => events.push(event) }]);

    await mkdir(join(dir, "sub"));
    await writeFile(join(dir, "a.xlsx"), "");
    await writeFile(join(dir, "sub", "b.XLSX"), "");
    await writeFile(join(dir, "~$a.xlsx"), "");
    await writeFile(join(dir, "notes.txt"), "");
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("expands folders recursively and skips lock files", async () => {
    const files = await expandInputs([dir], logger);
    expect(files).toEqual([join(dir, "a.xlsx"), join(dir, "sub", "b.XLSX")]);
  });

  it("keeps each file once", async () => {
    const files = await expandInputs([join(dir, "a.xlsx"), dir], logger);
    expect(files).toEqual([join(dir, "a.xlsx"), join(dir, "sub", "b.XLSX")]);
  });

  it("keeps explicit files whatever their extension", async () => {
    const files = await expandInputs([join(dir, "notes.txt")], logger);
    expect(files).toEqual([join(dir, "notes.txt")]);
  });

  it("warns about missing paths and empty folders", async () => {
    const empty = join(dir, "empty");
    await mkdir(empty);

    const files = await expandInputs([join(dir, "missing.xlsx"), empty], logger);

    expect(files).toEqual([]);
    expect(events.map((e) => e.message)).toEqual([
      `Path not found, skipping: ${join(dir, "missing.xlsx")}`,
      `No .xlsx files found in folder: ${empty}`,
    ]);
  });
});
