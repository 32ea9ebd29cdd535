/**
 * Include resolution.
 *
 * A config document may pull keys from other files:
 *
 *   include:
 *     - file: shared/grader
 *     - file: templates/feedback.yaml
 *       template_context: { points: 10 }
 *     - file: overrides
 *       force: true
 *
 * Host keys (everything but `include`) seed the result, then each include is
 * merged in list order. Without `force`, an included key that already exists
 * is an error naming both files; with `force`, it overwrites. Included files
 * may include further files; cycles are rejected.
 */

import { join, relative } from "node:path";
import { z } from "zod";
import { ConfigError } from "../errors.js";
import { checkFields, formatOf, getConfigPath, parseConfigFile, parseConfigText } from "../files/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import type { TemplateRenderer } from "../templates/index.js";
import { isConfigMapping, type ConfigMapping, type ConfigValue } from "../types/index.js";

export const INCLUDE_KEY = "include";

const IncludeEntrySchema = z.object({
  file: z.string().min(1),
  template_context: z.record(z.string(), z.unknown()).optional(),
  force: z.boolean().default(false),
});

export type IncludeEntry = z.infer<typeof IncludeEntrySchema>;

export interface IncludeOptions {
  /** Renderer for entries with a template_context */
  templates?: TemplateRenderer;
  /** Template names are computed relative to this directory */
  templateRoot?: string;
  logger?: Logger;
}

function describe(value: ConfigValue | undefined): string {
  return JSON.stringify(value ?? null);
}

/**
 * Validate one entry of an `include` list.
 */
export function parseIncludeEntry(entry: ConfigValue, hostFile: string): IncludeEntry {
  if (!isConfigMapping(entry)) {
    throw new ConfigError(`Include entries in "${hostFile}" must be mappings`);
  }
  checkFields(hostFile, entry, ["file"]);

  const result = IncludeEntrySchema.safeParse(entry);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid include entry in "${hostFile}": ${details}`);
  }
  return result.data;
}

function loadInclude(
  entry: IncludeEntry,
  includeFile: string,
  options: IncludeOptions
): ConfigValue {
  if (entry.template_context === undefined) {
    return parseConfigFile(includeFile);
  }

  if (options.templates === undefined) {
    throw new ConfigError(`Cannot render include "${includeFile}": no template renderer configured`);
  }
  const format = formatOf(includeFile);
  if (format === undefined) {
    throw new ConfigError(`Unsupported format "${includeFile}"`);
  }
  const templateName =
    options.templateRoot !== undefined ? relative(options.templateRoot, includeFile) : includeFile;
  const rendered = options.templates.render(templateName, entry.template_context);
  return parseConfigText(rendered, format, includeFile);
}

function resolveWithStack(
  document: ConfigMapping,
  hostFile: string,
  baseDir: string,
  options: IncludeOptions,
  stack: readonly string[]
): ConfigMapping {
  const logger = options.logger ?? silentLogger;
  const includes = document[INCLUDE_KEY];
  if (includes === undefined) {
    return document;
  }
  if (!Array.isArray(includes)) {
    throw new ConfigError(`"${INCLUDE_KEY}" in "${hostFile}" must be a list`);
  }

  const result: ConfigMapping = {};
  for (const [key, value] of Object.entries(document)) {
    if (key !== INCLUDE_KEY) {
      result[key] = value;
    }
  }

  for (const rawEntry of includes) {
    const entry = parseIncludeEntry(rawEntry, hostFile);
    const includeFile = getConfigPath(join(baseDir, entry.file));
    if (stack.includes(includeFile)) {
      throw new ConfigError(`Circular include: ${[...stack, includeFile].join(" -> ")}`);
    }

    const loaded = loadInclude(entry, includeFile, options);
    if (!isConfigMapping(loaded)) {
      throw new ConfigError(`Included file "${includeFile}" must contain a mapping`);
    }
    const newData = resolveWithStack(loaded, includeFile, baseDir, options, [...stack, includeFile]);
    logger.debug(`Including "${includeFile}" into "${hostFile}"`, { force: entry.force });

    for (const [newKey, newValue] of Object.entries(newData)) {
      if (!entry.force && Object.hasOwn(result, newKey)) {
        throw new ConfigError(
          `Key "${newKey}" with value ${describe(result[newKey])} already exists in config file "${hostFile}", ` +
            `cannot overwrite with key "${newKey}" with value ${describe(newValue)} from config file "${includeFile}", ` +
            `unless 'force' option of the 'include' key is set to true.`
        );
      }
      result[newKey] = newValue;
    }
  }

  return result;
}

/**
 * Merge every file named in `document.include` into the document.
 *
 * @param document - Parsed host document (not modified)
 * @param hostFile - Path of the host file, for error messages
 * @param baseDir  - Directory include paths are relative to
 * @returns The document itself when it has no `include`, else a new merged mapping
 * @throws ConfigError on missing fields, unresolvable files, collisions or cycles
 */
export function resolveIncludes(
  document: ConfigMapping,
  hostFile: string,
  baseDir: string,
  options: IncludeOptions = {}
): ConfigMapping {
  return resolveWithStack(document, hostFile, baseDir, options, [hostFile]);
}
