import { readFile } from "fs/promises";
import { join, dirname } from "path";
import { existsSync } from "fs";
import { fileURLToPath } from "url";
import envPaths from "env-paths";
import { ConfigurationError } from "./errors";
import { formatIssues, parseConfig } from "./parse-config";
import { ZodError } from "zod";
import { ConfigLayerSchema, PartialRawConfigSchema } from "../types";
import type { ConfigLayer, ConverterConfig } from "../types";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const paths = envPaths("prom-xml-converter", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/prom-xml-converter or ~/.config/prom-xml-converter
 * - macOS: ~/Library/Preferences/prom-xml-converter
 * - Windows: %APPDATA%\prom-xml-converter
 */
function getConfigDirectory(): string {
  return paths.config;
}

export function getDefaultConfigPath(): string {
  return join(__dirname, "..", "config", "default.json");
}

/**
 * Read one configuration layer and validate it
 */
export async function loadLayer(path: string): Promise<ConfigLayer> {
  const content = await readFile(path, "utf-8");
  const parsed: unknown = JSON.parse(content);

  PartialRawConfigSchema.parse(parsed);
  return ConfigLayerSchema.parse(parsed);
}

/**
 * Merge two layers. `defaults` and `lut` merge per key; row types are
 * replaced as a whole so their declaration order stays the one written.
 */
export function mergeLayers(base: ConfigLayer, override: ConfigLayer): ConfigLayer {
  return {
    ...base,
    ...override,
    defaults: { ...base.defaults, ...override.defaults },
    lut: { ...base.lut, ...override.lut },
    PROM: override.PROM ?? base.PROM,
  };
}

function describeError(error: unknown): string {
  if (error instanceof ZodError) return formatIssues(error);
  if (error instanceof Error) return error.message;
  return String(error);
}

export interface ConfigError {
  path: string;
  error: unknown;
}

interface LoadConfigResult {
  config: ConverterConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 *
 * A user config that fails to load is reported in `errors` and ignored.
 * A custom config is the mapping the caller asked for, so its failure is
 * fatal.
 *
 * @throws ConfigurationError
 */
export async function loadConfig(custom?: string): Promise<LoadConfigResult> {
  let layer = await loadLayer(getDefaultConfigPath());
  const errors: ConfigError[] = [];

  const userConfigPath = getUserConfigPath();
  if (existsSync(userConfigPath)) {
    try {
      layer = mergeLayers(layer, await loadLayer(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    if (!existsSync(custom)) {
      throw new ConfigurationError(`Config file not found: ${custom}`);
    }
    try {
      layer = mergeLayers(layer, await loadLayer(custom));
    } catch (error) {
      throw new ConfigurationError(
        `Invalid config file ${custom}: ${describeError(error)}`,
        error instanceof ZodError ? error.issues : [],
      );
    }
  }

  return { config: parseConfig(layer), errors };
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}
