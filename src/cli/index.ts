#!/usr/bin/env node

/**
 * CLI entry point for the PROM questionnaire → registry XML converter
 * Handles command-line argument parsing and user interaction
 */

import { Command, Option } from "commander";
import { convertCommand } from "./commands/convert";
import { configCommand } from "./commands/config";
import { LOG_LEVELS } from "../types";

const program = new Command();

program
  .name("prom-convert")
  .description("Convert PROM questionnaire spreadsheet exports to registry XML")
  .version("0.1.0");

// Main conversion command (default action)
program
  .option(
    "-x, --xls <paths...>",
    "Input .xlsx files and/or folders (folders are searched recursively)",
  )
  .option("-l, --lut <file>", "Lookup-table (demographics) spreadsheet")
  .option("-o, --output <file>", "Output XML file (default: template from config)")
  .option("--log <file|1>", "Log file path, or 1 for the file name template from config")
  .option("--hospital <n>", "Hospital number (overrides config)")
  .addOption(
    new Option("--loglevel <level>", "Log level (debug shows patient data)")
      .choices(LOG_LEVELS)
      .default("info"),
  )
  .option("-c, --config <path>", "Path to custom config file")
  .option("--dry-run", "Convert without writing the output file")
  .option("-v, --verbose", "List every issue in the summary")
  .action(convertCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program.parse();
