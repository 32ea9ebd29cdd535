/**
 * A loaded course.
 *
 * Holds the processed course index and lazily loads the exercise configs it
 * lists, keeping each one until its file changes.
 */

import { ConfigError, type ConfigIssue } from "../errors.js";
import type { Course } from "../course/index.js";
import { ExerciseConfig, locateExerciseConfig } from "../exercises/index.js";
import { isFresh, type Clock, type CourseMeta, type FileStat } from "../files/index.js";
import type { IncludeOptions } from "../includes/index.js";
import type { Logger } from "../logging/index.js";
import type { LanguageVariantSet, MarkupRenderer } from "../tags/index.js";
import type { ConfigMapping } from "../types/index.js";

/** What a course needs to load its exercise configs. */
export interface ExerciseLoadContext {
  stat: FileStat;
  clock: Clock;
  logger: Logger;
  includes?: IncludeOptions;
  markup?: MarkupRenderer;
}

export interface CourseConfigInit {
  key: string;
  meta: CourseMeta;
  /** Course index file */
  file: string;
  /** Course directory */
  dir: string;
  /** Directory exercise configs are resolved against */
  configDir: string;
  mtime: number;
  ptime: number;
  /** Default-language index with `key`, `mtime`, `dir`, `lang`, `static_url`, `exercises`, `config_files` */
  data: ConfigMapping;
  variants: LanguageVariantSet;
  lang: string;
  course?: Readonly<Course>;
  warnings: ConfigIssue[];
  /** Exercise keys in course order */
  exercises: string[];
  /** Exercise key → config path as written in the course */
  configFiles: Readonly<Record<string, string>>;
}

export class CourseConfig {
  readonly key: string;
  readonly meta: CourseMeta;
  readonly file: string;
  readonly dir: string;
  readonly configDir: string;
  readonly mtime: number;
  readonly ptime: number;
  readonly data: ConfigMapping;
  readonly variants: LanguageVariantSet;
  readonly lang: string;
  readonly course: Readonly<Course> | undefined;
  readonly warnings: readonly ConfigIssue[];
  readonly exercises: readonly string[];
  readonly configFiles: Readonly<Record<string, string>>;

  private readonly exerciseConfigs = new Map<string, ExerciseConfig>();

  constructor(
    init: CourseConfigInit,
    private readonly context: ExerciseLoadContext
  ) {
    this.key = init.key;
    this.meta = init.meta;
    this.file = init.file;
    this.dir = init.dir;
    this.configDir = init.configDir;
    this.mtime = init.mtime;
    this.ptime = init.ptime;
    this.data = init.data;
    this.variants = init.variants;
    this.lang = init.lang;
    this.course = init.course;
    this.warnings = init.warnings;
    this.exercises = init.exercises;
    this.configFiles = init.configFiles;
  }

  /**
   * Get the config of an exercise listed in this course.
   *
   * @returns undefined for keys the course does not list
   * @throws ConfigError when the config file cannot be loaded
   */
  exerciseConfig(exerciseKey: string): ExerciseConfig | undefined {
    const configPath = this.configFiles[exerciseKey];
    if (!this.exercises.includes(exerciseKey) || configPath === undefined) {
      return undefined;
    }

    const cached = this.exerciseConfigs.get(exerciseKey);
    if (cached !== undefined && isFresh(cached.mtime, cached.file, this.context.stat)) {
      return cached;
    }

    this.context.logger.debug(`Loading exercise "${this.key}/${exerciseKey}"`);
    const loaded = ExerciseConfig.load({
      ...locateExerciseConfig(configPath, this.dir, this.configDir),
      exerciseKey,
      defaultLanguage: this.lang,
      includes: this.context.includes,
      markup: this.context.markup,
      logger: this.context.logger,
      stat: this.context.stat,
      clock: this.context.clock,
    });
    this.exerciseConfigs.set(exerciseKey, loaded);
    return loaded;
  }

  exerciseData(exerciseKey: string, lang?: string): ConfigMapping | undefined {
    return this.exerciseConfig(exerciseKey)?.dataForLanguage(lang);
  }

  /**
   * Exercise records for every exercise the course lists, in course order.
   *
   * @throws ConfigError when a listed exercise has no config
   */
  getExerciseList(): ConfigMapping[] {
    return this.exercises.map((exerciseKey) => {
      const exercise = this.exerciseData(exerciseKey);
      if (exercise === undefined) {
        throw new ConfigError(`Invalid exercise key "${exerciseKey}" listed in "${this.file}"`);
      }
      return exercise;
    });
  }
}
