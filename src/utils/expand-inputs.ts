import glob from "fast-glob";
import path from "node:path";
import { stat } from "fs/promises";
import type { Logger } from "./logger";

/**
 * Expand files and folders into a de-duplicated list of spreadsheets
 *
 * Files are kept as given, whatever their extension. Folders contribute
 * every .xlsx below them, sorted.
 */
export async function expandInputs(inputs: string[], logger: Logger): Promise<string[]> {
  const seen = new Set<string>();
  const result: string[] = [];

  function add(file: string): void {
    if (seen.has(file)) return;
    seen.add(file);
    result.push(file);
  }

  for (const input of inputs) {
    const resolved = path.resolve(input);
    const info = await stat(resolved).catch(() => null);

    if (!info) {
      logger.warn(`Path not found, skipping: ${resolved}`);
    } else if (info.isDirectory()) {
      const files = await glob("**/*.xlsx", {
        cwd: resolved,
        absolute: true,
        onlyFiles: true,
        caseSensitiveMatch: false,
        ignore: ["**/~$*"], // Excel lock files
      });
      if (files.length === 0) {
        logger.warn(`No .xlsx files found in folder: ${resolved}`);
      }
      for (const file of files.sort()) {
        add(path.normalize(file));
      }
    } else {
      add(resolved);
    }
  }

  return result;
}
