import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, mergeLayers } from "./load-config";
import { ConfigurationError } from "./errors";

describe("mergeLayers", () => {
  it("merges defaults per key and replaces row types", () => {
    const merged = mergeLayers(
      {
        defaults: { hospital: 1, lut_column_prefix: "__LUT__" },
        lut: { join_column: "Patient ID" },
        PROM: { OKS: {}, OHS: {} },
      },
      { defaults: { hospital: 2 }, PROM: { KOOS: {} } },
    );

    expect(merged).toEqual({
      defaults: { hospital: 2, lut_column_prefix: "__LUT__" },
      lut: { join_column: "Patient ID" },
      PROM: { KOOS: {} },
    });
  });

  it("keeps the base row types when the override has none", () => {
    const merged = mergeLayers({ PROM: { OKS: {} } }, { defaults: { hospital: 5 } });
    expect(merged.PROM).toEqual({ OKS: {} });
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "prom-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("loads the bundled mapping", async () => {
    const { config } = await loadConfig();
    expect(config.rowTypes.map((rowType) => rowType.name)).toEqual(["OKS", "OHS", "KOOS", "HOOS"]);
    expect(config.lutJoinColumn).toBe("Patient ID");
  });

  it("layers a custom config over the bundled one", async () => {
    const path = join(dir, "custom.json");
    await writeFile(
      path,
      JSON.stringify({
        defaults: { hospital: 12 },
        PROM: { OHS: { detection_column: "OHS Total", UPNNUM: { column: "MRN" } } },
      }),
    );

    const { config } = await loadConfig(path);

    expect(config.hospital).toBe(12);
    expect(config.lutColumnPrefix).toBe("__LUT__");
    expect(config.lutJoinColumn).toBe("Patient ID");
    expect(config.rowTypes).toEqual([
      {
        name: "OHS",
        detectionColumn: "OHS Total",
        fields: [{ outputName: "UPNNUM", sourceColumn: "MRN", conversions: [] }],
      },
    ]);
  });

  it("fails when the custom config does not exist", async () => {
    const path = join(dir, "missing.json");
    await expect(loadConfig(path)).rejects.toThrow(`Config file not found: ${path}`);
  });

  it("fails when the custom config is invalid", async () => {
    const path = join(dir, "invalid.json");
    await writeFile(path, JSON.stringify({ defaults: { hospital: -1 } }));

    await expect(loadConfig(path)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("fails when the custom config is not JSON", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "{ defaults");

    await expect(loadConfig(path)).rejects.toThrow(`Invalid config file ${path}`);
  });
});
