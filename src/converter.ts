/**
 * Converter - Pipeline orchestrator
 * Runs every input row through detect → merge → extract → assemble
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname, resolve } from "node:path";
import * as modules from "./modules";
import { ConfigurationError } from "./utils/errors";
import { REQUIRED_ELEMENTS } from "./utils/element-order";
import { readWorksheet } from "./utils/read-worksheet";
import { Logger } from "./utils/logger";
import { Tracker } from "./utils/tracker";
import type {
  ConversionContext,
  ConverterConfig,
  SourceRow,
  WorksheetData,
} from "./types";

export interface ConvertOptions {
  /** Auxiliary spreadsheet joined into rows whose row type asks for it */
  lutFile?: string;
  /** Where to write the document; the caller persists it otherwise */
  outputFile?: string;
  logger?: Logger;
  tracker?: Tracker;
}

export interface ConvertResult {
  document: string;
  converted: number;
  skipped: number;
}

/**
 * Convert one or more spreadsheets into a single registry XML document
 *
 * Row-level problems are logged and counted as skipped; only configuration
 * problems (including a LUT without its join column) abort the run.
 *
 * @throws ConfigurationError
 */
export async function convert(
  inputFiles: string[],
  config: ConverterConfig,
  options: ConvertOptions = {},
): Promise<ConvertResult> {
  const ctx: ConversionContext = {
    config,
    logger: options.logger ?? new Logger(),
    tracker: options.tracker ?? new Tracker(),
    document: [],
  };
  const { logger, tracker } = ctx;

  if (config.rowTypes.length === 0) {
    throw new ConfigurationError("No row types are configured");
  }

  let files = inputFiles;
  if (options.lutFile) {
    ctx.lut = await modules.loadLut(options.lutFile, config.lutJoinColumn, logger);
    tracker.setLutRecords(ctx.lut.loaded);

    // The LUT is not a questionnaire export
    const lutPath = resolve(options.lutFile);
    files = inputFiles.filter((file) => resolve(file) !== lutPath);
  }

  tracker.setTotalFiles(files.length);

  for (const file of files) {
    await convertFile(ctx, file);
  }

  logger.info(`Conversion complete: ${tracker.converted} questionnaires converted`);
  if (tracker.skipped > 0) {
    logger.warn(`${tracker.skipped} questionnaires skipped`);
  }

  const document = modules.serializeDocument(ctx.document);

  if (options.outputFile) {
    await mkdir(dirname(options.outputFile), { recursive: true });
    await writeFile(options.outputFile, document, "utf-8");
    logger.info(`XML written to: ${options.outputFile}`);
  }

  return { document, converted: tracker.converted, skipped: tracker.skipped };
}

async function convertFile(ctx: ConversionContext, file: string): Promise<void> {
  const { logger, tracker } = ctx;
  logger.info(`Processing XLS: ${file}`);

  let sheet: WorksheetData | null;
  try {
    sheet = await readWorksheet(file);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Could not read ${file}: ${message}`);
    tracker.trackFileError(file, error);
    return;
  }

  if (!sheet) {
    logger.warn(`XLS file appears to be empty: ${file}`);
    tracker.trackEmptyFile(file);
    return;
  }

  tracker.incrementProcessed();

  // Detection is logged once per change of row type
  let currentRowType: string | undefined;

  for (let index = 0; index < sheet.rows.length; index++) {
    const rowNumber = sheet.rowNumbers[index];
    const detected = convertRow(ctx, file, rowNumber, sheet.rows[index], currentRowType);
    currentRowType = detected ?? currentRowType;
  }
}

/**
 * @returns the detected row type name, if any
 */
function convertRow(
  ctx: ConversionContext,
  file: string,
  rowNumber: number,
  source: SourceRow,
  currentRowType: string | undefined,
): string | undefined {
  const { config, logger, tracker } = ctx;

  const rowType = modules.detectRowType(source, config.rowTypes);
  if (!rowType) {
    logger.warn(`No PROM type detected for row ${rowNumber}`);
    tracker.trackSkippedRow(file, rowNumber, "no-row-type");
    return undefined;
  }

  if (rowType.name !== currentRowType) {
    logger.info(`Detected PROM type: ${rowType.name}`);
  }

  let row = source;
  if (ctx.lut) {
    const merge = modules.mergeLutData(row, ctx.lut, rowType.lookup, config.lutColumnPrefix, logger);
    row = merge.row;
    if (merge.outcome === "miss" && merge.key) {
      tracker.trackLookupMiss(file, rowNumber, merge.key);
    }
  }

  const { elements, failures } = modules.extractElements(row, rowType, logger);
  for (const failure of failures) {
    tracker.trackValidation(file, rowNumber, failure);
  }

  for (const required of REQUIRED_ELEMENTS) {
    // A value converted to "" counts as missing
    if (elements.get(required)) continue;

    const failed = failures.some((failure) => failure.field === required);
    const details = failed ? `${required} failed validation` : `missing ${required}`;
    logger.warn(`Row skipped: ${details}`);
    tracker.trackSkippedRow(file, rowNumber, "missing-required-field", details);
    return rowType.name;
  }

  ctx.document.push(modules.assembleRecord(elements, rowType.name, config.hospital));
  tracker.incrementConverted();

  const personId = elements.get(REQUIRED_ELEMENTS[0]);
  logger.info(`Converted ${rowType.name} questionnaire: UPNNUM=${personId}`, personId);

  return rowType.name;
}
