/**
 * Configuration type definitions with Zod schemas
 *
 * The raw schemas describe the JSON mapping file as users write it
 * (snake_case, row types and fields as sibling keys). The model types
 * below are what the engine reads after `parseConfig` has resolved it.
 */

import { z } from "zod";

// Keys of a row-type section that are not output fields
export const ROW_TYPE_META_KEYS = ["detection_column", "lookup"] as const;

// Keys of a lookup section that are not legacy field → column entries
export const LOOKUP_META_KEYS = ["required", "join_column", "add_columns"] as const;

/**
 * Move every non-meta key of a section under `target`, so the remaining
 * object can be validated with a fixed shape.
 */
function splitMetaKeys(metaKeys: readonly string[], target: string) {
  return (raw: unknown): unknown => {
    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
      return raw;
    }
    const meta: Record<string, unknown> = {};
    const rest: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(raw)) {
      if (metaKeys.includes(key)) {
        meta[key] = value;
      } else {
        rest[key] = value;
      }
    }
    return { ...meta, [target]: rest };
  };
}

// Zod schemas
export const ConversionRuleSchema = z
  .object({
    match: z.string().min(1),
    replace: z.string().optional(),
    flags: z
      .string()
      .regex(/^[imsIMS]*$/, "flags may only contain i, m and s")
      .default("i"),
  })
  .strict();

export const FieldSectionSchema = z
  .object({
    column: z.string().min(1),
    value: z.array(ConversionRuleSchema).default([]),
  })
  .strict();

export const LookupSectionSchema = z.preprocess(
  splitMetaKeys(LOOKUP_META_KEYS, "legacy"),
  z.object({
    required: z.boolean().default(false),
    join_column: z.string().min(1).optional(),
    add_columns: z.array(z.string().min(1)).optional(),
    // Legacy form: output field name → auxiliary column name
    legacy: z.record(z.string(), z.string().min(1)),
  }),
);

export const RowTypeSectionSchema = z.preprocess(
  splitMetaKeys(ROW_TYPE_META_KEYS, "fields"),
  z.object({
    detection_column: z.string().min(1),
    lookup: LookupSectionSchema.optional(),
    fields: z.record(z.string(), FieldSectionSchema),
  }),
);

export const DefaultsSectionSchema = z.object({
  hospital: z.number().int().nonnegative().default(0),
  lut_column_prefix: z.string().default("__LUT__"),
  output_dir: z.string().default("."),
  xml_file_template: z.string().default("{yyyy}-{mm}-{dd}_{appname}_output.xml"),
  log_file_template: z.string().default("{yyyy}-{mm}-{dd}_{appname}.log"),
  // Empty disables the spreadsheet audit log
  xlsx_log_file_template: z.string().default(""),
});

export const LutSectionSchema = z.object({
  join_column: z.string().min(1).default("PatientRecordID"),
});

export const RawConfigSchema = z.object({
  defaults: DefaultsSectionSchema.default({}),
  lut: LutSectionSchema.default({}),
  PROM: z.record(z.string(), RowTypeSectionSchema).default({}),
});

// Partial schema for user/custom config layers (top-level AND nested properties optional)
export const PartialRawConfigSchema = z.object({
  defaults: DefaultsSectionSchema.partial().optional(),
  lut: LutSectionSchema.partial().optional(),
  PROM: z.record(z.string(), RowTypeSectionSchema).optional(),
});

// Same layer with row types left raw, so layers can be merged before parsing
export const ConfigLayerSchema = PartialRawConfigSchema.extend({
  PROM: z.record(z.string(), z.unknown()).optional(),
});

// Infer TypeScript types from Zod schemas
export type RawConfig = z.input<typeof RawConfigSchema>;
export type PartialRawConfig = z.input<typeof PartialRawConfigSchema>;
export type ConfigLayer = z.output<typeof ConfigLayerSchema>;
export type ParsedRawConfig = z.output<typeof RawConfigSchema>;
export type RawRowTypeSection = z.output<typeof RowTypeSectionSchema>;
export type RawLookupSection = z.output<typeof LookupSectionSchema>;

// ============================================================================
// Engine model
// ============================================================================

export interface ConversionRule {
  pattern: string;
  /** Absent for validation-only rules */
  replacement?: string;
  flags: string;
}

export interface FieldMapping {
  outputName: string;
  sourceColumn: string;
  conversions: ConversionRule[];
}

export interface LookupSpec {
  required: boolean;
  joinColumn: string;
  /** Auxiliary columns copied into the row, in order */
  columns: string[];
}

export interface RowTypeDefinition {
  name: string;
  detectionColumn: string;
  fields: FieldMapping[];
  lookup?: LookupSpec;
}

export interface OutputTemplates {
  directory: string;
  xmlFile: string;
  logFile: string;
  xlsxLogFile: string;
}

export interface ConverterConfig {
  hospital: number;
  lutColumnPrefix: string;
  lutJoinColumn: string;
  /** Declaration order is detection order */
  rowTypes: RowTypeDefinition[];
  output: OutputTemplates;
}
