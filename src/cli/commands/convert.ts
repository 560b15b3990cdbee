/**
 * Convert command - Loads config, wires logging and runs the conversion
 */

import ora from "ora";
import path from "node:path";
import { z } from "zod";
import { convert } from "../../converter";
import * as modules from "../../modules";
import {
  ConfigurationError,
  ConsoleSink,
  Logger,
  TextFileSink,
  Tracker,
  XlsxAuditSink,
  expandInputs,
  expandTemplate,
  loadConfig,
} from "../../utils";
import { LOG_LEVELS } from "../../types";
import type { ConverterConfig } from "../../types";

const ConvertOptionsSchema = z.object({
  xls: z.array(z.string()).optional(),
  lut: z.string().optional(),
  output: z.string().optional(),
  log: z.string().optional(),
  hospital: z.coerce.number().int().nonnegative().optional(),
  loglevel: z.enum(LOG_LEVELS).default("info"),
  config: z.string().optional(),
  dryRun: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof ConvertOptionsSchema>;

// Exit codes
const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_NOTHING_CONVERTED = 2;

/**
 * `--log 1` means "use the template from config"
 */
export function resolveLogPath(log: string | undefined, config: ConverterConfig): string | undefined {
  if (!log) return undefined;
  return log === "1" ? expandTemplate(config.output.logFile) : log;
}

export function resolveXlsxLogPath(log: string | undefined, config: ConverterConfig): string | undefined {
  if (!log || config.output.xlsxLogFile.trim() === "") return undefined;
  return expandTemplate(config.output.xlsxLogFile);
}

export function resolveOutputPath(output: string | undefined, config: ConverterConfig): string {
  if (output) return output;
  return path.join(config.output.directory, expandTemplate(config.output.xmlFile));
}

function formatOptionIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `--${issue.path.join(".")}: ${issue.message}`).join("; ");
}

export async function convertCommand(opts: Options): Promise<void> {
  const parsed = ConvertOptionsSchema.safeParse(opts);
  if (!parsed.success) {
    console.error(`Invalid options: ${formatOptionIssues(parsed.error)}`);
    process.exitCode = EXIT_FAILURE;
    return;
  }
  const options = parsed.data;

  const spinner = ora({ text: "Loading configuration...", indent: 2 });
  const logger = new Logger(options.loglevel, [
    new ConsoleSink({
      beforeWrite: () => spinner.clear(),
      afterWrite: () => {
        if (spinner.isSpinning) spinner.render();
      },
    }),
  ]);

  try {
    spinner.start();

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);
    for (const err of errors) {
      const message = err.error instanceof Error ? err.error.message : String(err.error);
      logger.warn(`Ignoring user config ${err.path}: ${message}`);
    }

    // Override with CLI options
    if (options.hospital !== undefined) {
      config.hospital = options.hospital;
    }

    const logPath = resolveLogPath(options.log, config);
    const xlsxLogPath = resolveXlsxLogPath(options.log, config);
    const outputPath = options.dryRun ? undefined : resolveOutputPath(options.output, config);

    if (logPath) {
      logger.addSink(await TextFileSink.open(logPath));
      logger.info(`Log file: ${path.resolve(logPath)}`);
    }
    if (xlsxLogPath) {
      logger.addSink(new XlsxAuditSink(xlsxLogPath));
      logger.info(`Excel log file: ${path.resolve(xlsxLogPath)}`);
    }

    const inputFiles = await expandInputs(options.xls ?? [], logger);
    if (inputFiles.length === 0) {
      throw new ConfigurationError("At least one --xls file or folder is required");
    }

    logger.info(`Input files: ${inputFiles.join(", ")}`);
    logger.info(`LUT: ${options.lut ?? "(none)"}`);
    logger.info(`Output: ${outputPath ?? "(dry run)"}`);

    spinner.text = "Converting questionnaires...";
    const tracker = new Tracker();
    const { converted } = await convert(inputFiles, config, {
      lutFile: options.lut,
      outputFile: outputPath,
      logger,
      tracker,
    });

    spinner.stop();
    modules.stats(tracker, { verbose: options.verbose, outputFile: outputPath });
    process.exitCode = converted > 0 ? EXIT_OK : EXIT_NOTHING_CONVERTED;
  } catch (error) {
    spinner.fail("Conversion failed");
    if (error instanceof ConfigurationError) {
      logger.error(error.message);
    } else {
      console.error(error);
    }
    process.exitCode = EXIT_FAILURE;
  } finally {
    try {
      await logger.close();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Could not finish log files: ${message}`);
      process.exitCode = EXIT_FAILURE;
    }
  }
}
