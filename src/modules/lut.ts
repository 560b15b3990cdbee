/**
 * Lookup-Table Module
 * Loads the auxiliary spreadsheet into an index keyed by the join column
 */

import { ConfigurationError } from "../utils/errors";
import { cellToString } from "../utils/cell-value";
import { readWorksheet } from "../utils/read-worksheet";
import type { Logger } from "../utils/logger";
import type { LutIndex, SourceRow } from "../types";

/**
 * Load the first worksheet of `path` indexed by the trimmed `joinColumn` value
 *
 * Rows with an empty key are counted as skipped. When a key repeats, the
 * later row wins.
 *
 * @throws ConfigurationError when `joinColumn` is not one of the headers
 */
export async function loadLut(
  path: string,
  joinColumn: string,
  logger: Logger,
): Promise<LutIndex> {
  logger.info(`Loading LUT: ${path}`);

  const sheet = await readWorksheet(path);
  if (!sheet) {
    logger.warn(`LUT file appears to be empty: ${path}`);
    return { joinColumn, records: new Map(), loaded: 0, skipped: 0 };
  }

  if (!sheet.headers.includes(joinColumn)) {
    throw new ConfigurationError(
      `LUT join column '${joinColumn}' not found in ${path}. ` +
        `Available columns: ${sheet.headers.map((h) => `'${h}'`).join(", ")}`,
    );
  }

  const records = new Map<string, SourceRow>();
  let loaded = 0;
  let skipped = 0;

  for (const row of sheet.rows) {
    const key = cellToString(row.get(joinColumn));
    if (key === "") {
      skipped++;
      continue;
    }
    records.set(key, row);
    loaded++;
  }

  logger.info(
    `LUT loaded: ${loaded} records indexed by '${joinColumn}' (${skipped} skipped)`,
  );

  return { joinColumn, records, loaded, skipped };
}
