/**
 * JSON and YAML configuration parsing.
 *
 * The format of a file is chosen by its extension. Parsed content is
 * normalized to a ConfigValue tree so the rest of the engine never sees
 * parser-specific objects.
 */

import { readFileSync } from "node:fs";
import { extname } from "node:path";
import { parse as parseYaml } from "yaml";
import { ConfigError } from "../errors.js";
import { isConfigMapping, toConfigValue, type ConfigMapping, type ConfigValue } from "../types/index.js";

/**
 * Course files are written for YAML 1.1: `<<` merge keys apply and
 * yes/no/on/off are booleans.
 */
const YAML_OPTIONS = { version: "1.1" } as const;

/** Supported formats, in probing order. */
export const CONFIG_FORMATS = ["json", "yaml"] as const;
export type ConfigFormat = (typeof CONFIG_FORMATS)[number];

export function isConfigFormat(value: string): value is ConfigFormat {
  return (CONFIG_FORMATS as readonly string[]).includes(value);
}

/**
 * Format implied by a file's extension, undefined when unsupported.
 */
export function formatOf(filePath: string): ConfigFormat | undefined {
  const ext = extname(filePath).slice(1);
  return isConfigFormat(ext) ? ext : undefined;
}

/**
 * Parse configuration text in a known format.
 *
 * @param text   - File content (or rendered template output)
 * @param format - json or yaml
 * @param source - File path used in error messages
 * @throws ConfigError on syntax errors or non-data values
 */
export function parseConfigText(text: string, format: ConfigFormat, source: string): ConfigValue {
  let raw: unknown;
  try {
    raw = format === "json" ? JSON.parse(text) : parseYaml(text, YAML_OPTIONS);
  } catch (err) {
    throw new ConfigError(`Configuration error in ${source}`, { cause: err });
  }

  const invalid: string[] = [];
  const value = toConfigValue(raw, (path) => invalid.push(path));
  if (invalid.length > 0) {
    throw new ConfigError(
      `Configuration error in ${source}: unsupported value at ${invalid.join(", ")}`
    );
  }
  return value;
}

/**
 * Read and parse a configuration file, format chosen by extension.
 */
export function parseConfigFile(filePath: string): ConfigValue {
  const format = formatOf(filePath);
  if (format === undefined) {
    throw new ConfigError(`Unsupported format "${filePath}"`);
  }

  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read configuration file "${filePath}"`, { cause: err });
  }
  return parseConfigText(text, format, filePath);
}

/**
 * Parse a configuration file whose top level must be a mapping.
 */
export function parseConfigMapping(filePath: string): ConfigMapping {
  const data = parseConfigFile(filePath);
  if (!isConfigMapping(data)) {
    throw new ConfigError(`Failed to parse configuration file "${filePath}": expected a mapping`);
  }
  return data;
}

/**
 * Verify that a configuration entry contains every named field.
 *
 * @param fileName - File name for the error message
 * @throws ConfigError naming the first missing field
 */
export function checkFields(fileName: string, data: ConfigMapping, fieldNames: readonly string[]): void {
  for (const name of fieldNames) {
    if (!Object.hasOwn(data, name)) {
      throw new ConfigError(`Required field "${name}" missing from "${fileName}"`);
    }
  }
}
