/**
 * Exercise configuration.
 *
 * One exercise config file (JSON or YAML, possibly with includes and
 * processor tags) becomes one record per language. Every language version
 * must declare `title` and `view_type`, and is stamped with the exercise
 * `key` and the file's `mtime`.
 */

import { join } from "node:path";
import { checkFields, getConfigPath, nodeFileStat, parseConfigMapping, systemClock, type Clock, type FileStat } from "../files/index.js";
import { resolveIncludes, type IncludeOptions } from "../includes/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { processTags, type LanguageVariantSet, type MarkupRenderer } from "../tags/index.js";
import type { ConfigMapping } from "../types/index.js";

/** Fields every language version of an exercise must have. */
export const REQUIRED_EXERCISE_FIELDS = ["title", "view_type"] as const;

/** Selector for `dataForLanguage` that returns every language version. */
export const ROOT_LANGUAGE: unique symbol = Symbol("root-language");

/**
 * Where an exercise config path written in a course points to.
 *
 * A leading `/` makes the path relative to the course directory; any other
 * path is relative to the grader config directory.
 */
export function locateExerciseConfig(
  configPath: string,
  courseDir: string,
  graderConfigDir: string
): { filename: string; baseDir: string } {
  if (configPath.startsWith("/")) {
    return { filename: configPath.slice(1), baseDir: courseDir };
  }
  return { filename: configPath, baseDir: graderConfigDir };
}

export interface ExerciseConfigInit {
  /** Resolved config file path */
  file: string;
  /** File modification time (ms) when loaded */
  mtime: number;
  /** Time the file was parsed (ms) */
  ptime: number;
  data: LanguageVariantSet;
  defaultLanguage: string;
}

export interface LoadExerciseOptions {
  exerciseKey: string;
  /** Config path relative to baseDir, extension optional */
  filename: string;
  baseDir: string;
  defaultLanguage: string;
  includes?: IncludeOptions;
  markup?: MarkupRenderer;
  logger?: Logger;
  stat?: FileStat;
  clock?: Clock;
}

export class ExerciseConfig {
  readonly file: string;
  readonly mtime: number;
  readonly ptime: number;
  readonly data: LanguageVariantSet;
  readonly defaultLanguage: string;

  constructor(init: ExerciseConfigInit) {
    this.file = init.file;
    this.mtime = init.mtime;
    this.ptime = init.ptime;
    this.data = init.data;
    this.defaultLanguage = init.defaultLanguage;
  }

  get languages(): string[] {
    return Object.keys(this.data);
  }

  /**
   * Get the exercise record for a language.
   *
   * Falls back to the default language, then to any language version.
   * The returned record has `lang` set to the language actually chosen.
   */
  dataForLanguage(selector: typeof ROOT_LANGUAGE): LanguageVariantSet;
  dataForLanguage(lang?: string): ConfigMapping;
  dataForLanguage(lang?: string | typeof ROOT_LANGUAGE): ConfigMapping | LanguageVariantSet {
    if (lang === ROOT_LANGUAGE) {
      return this.data;
    }

    for (const candidate of [lang, this.defaultLanguage]) {
      if (candidate === undefined) {
        continue;
      }
      const version = this.data[candidate];
      if (version !== undefined) {
        return { ...version, lang: candidate };
      }
    }

    const [first] = Object.entries(this.data);
    if (first === undefined) {
      return {};
    }
    return { ...first[1], lang: first[0] };
  }

  /**
   * Find, parse and process an exercise config file.
   *
   * @throws ConfigError if the file is missing, ambiguous, malformed or
   *   lacks a required field in any language version
   */
  static load(options: LoadExerciseOptions): ExerciseConfig {
    const stat = options.stat ?? nodeFileStat;
    const clock = options.clock ?? systemClock;
    const logger = options.logger ?? silentLogger;

    const configFile = getConfigPath(join(options.baseDir, options.filename));
    let data = parseConfigMapping(configFile);
    data = resolveIncludes(data, configFile, options.baseDir, { logger, ...options.includes });
    const mtime = stat.mtime(configFile);

    const variants = processTags(data, options.defaultLanguage, { markup: options.markup, logger });
    const stamped: Record<string, ConfigMapping> = {};
    for (const [language, version] of Object.entries(variants)) {
      checkFields(configFile, version, REQUIRED_EXERCISE_FIELDS);
      stamped[language] = { ...version, key: options.exerciseKey, mtime };
    }

    logger.debug(`Loaded exercise "${options.exerciseKey}"`, {
      file: configFile,
      languages: Object.keys(stamped),
    });

    return new ExerciseConfig({
      file: configFile,
      mtime,
      ptime: clock(),
      data: stamped,
      defaultLanguage: options.defaultLanguage,
    });
  }
}
