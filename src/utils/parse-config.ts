/**
 * Configuration Parser
 * Validates a raw mapping configuration and resolves it into the engine model
 */

import { ZodError } from "zod";
import { ConfigurationError } from "./errors";
import { getElementOrder } from "./element-order";
import { RawConfigSchema } from "../types";
import type {
  ConverterConfig,
  FieldMapping,
  LookupSpec,
  ParsedRawConfig,
  RawLookupSection,
  RawRowTypeSection,
  RowTypeDefinition,
} from "../types";

/**
 * Format zod issues as `path: message` lines
 */
export function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Resolve the auxiliary columns of a lookup section
 *
 * A non-empty `add_columns` wins; legacy `field: column` entries are only
 * used when it is absent or empty.
 */
export function resolveLookup(
  section: RawLookupSection,
  defaultJoinColumn: string,
): LookupSpec {
  const addColumns = section.add_columns ?? [];
  const columns =
    addColumns.length > 0
      ? [...addColumns]
      : [...new Set(Object.values(section.legacy))];

  return {
    required: section.required,
    joinColumn: section.join_column ?? defaultJoinColumn,
    columns,
  };
}

function resolveRowType(
  name: string,
  section: RawRowTypeSection,
  defaultJoinColumn: string,
): RowTypeDefinition {
  const order = getElementOrder(name);
  if (!order) {
    throw new ConfigurationError(
      `No schema element order is defined for row type '${name}'`,
    );
  }

  const fields: FieldMapping[] = [];
  for (const [outputName, field] of Object.entries(section.fields)) {
    if (!order.includes(outputName)) {
      throw new ConfigurationError(
        `Field '${outputName}' of row type '${name}' is not part of its schema element order`,
      );
    }
    fields.push({
      outputName,
      sourceColumn: field.column,
      conversions: field.value.map((rule) => ({
        pattern: rule.match,
        replacement: rule.replace,
        flags: rule.flags,
      })),
    });
  }

  const definition: RowTypeDefinition = {
    name,
    detectionColumn: section.detection_column,
    fields,
  };
  if (section.lookup) {
    definition.lookup = resolveLookup(section.lookup, defaultJoinColumn);
  }
  return definition;
}

/**
 * Resolve an already validated raw configuration
 */
export function toConverterConfig(raw: ParsedRawConfig): ConverterConfig {
  const { defaults, lut } = raw;

  return {
    hospital: defaults.hospital,
    lutColumnPrefix: defaults.lut_column_prefix,
    lutJoinColumn: lut.join_column,
    rowTypes: Object.entries(raw.PROM).map(([name, section]) =>
      resolveRowType(name, section, lut.join_column),
    ),
    output: {
      directory: defaults.output_dir,
      xmlFile: defaults.xml_file_template,
      logFile: defaults.log_file_template,
      xlsxLogFile: defaults.xlsx_log_file_template,
    },
  };
}

/**
 * Validate and resolve a raw configuration object
 *
 * @throws ConfigurationError when the object does not describe a valid mapping
 */
export function parseConfig(input: unknown): ConverterConfig {
  const result = RawConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${formatIssues(result.error)}`,
      result.error.issues,
    );
  }
  return toConverterConfig(result.data);
}
