/**
 * Course configuration cache.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * FRESHNESS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A cached course is returned as long as its recorded mtime is not older than
 * the index file's current mtime. A failed stat counts as fresh.
 *
 * Independently, when the courses directory itself has a newer mtime than the
 * last one observed, every cached course is dropped.
 *
 * Every operation runs to completion synchronously, so a freshness check and
 * the reload that follows it cannot interleave with another caller.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { join } from "node:path";
import { ConfigError, isConfigError, type ConfigIssue } from "../errors.js";
import { flattenExerciseRefs, postprocessCourse, validateCourse, type Course, type PostprocessResult } from "../course/index.js";
import {
  checkFields,
  configDir,
  getConfigPath,
  isFresh,
  metaPath,
  nodeFileStat,
  parseConfigMapping,
  readCourseMeta,
  systemClock,
  type Clock,
  type CourseMeta,
  type FileStat,
} from "../files/index.js";
import { resolveIncludes, type IncludeOptions } from "../includes/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { DirectoryCourseRegistry, type CourseRegistry } from "../registry/index.js";
import { noopStaticLinker, type StaticAssetLinker } from "../static/index.js";
import { processTags, type MarkupRenderer } from "../tags/index.js";
import type { TemplateRenderer } from "../templates/index.js";
import type { ConfigMapping, ConfigValue } from "../types/index.js";
import type { ExerciseConfig } from "../exercises/index.js";
import { CourseConfig, type ExerciseLoadContext } from "./course-config.js";

/** Course index file name, without extension */
export const INDEX_FILE = "index";

export const FALLBACK_LANGUAGE = "en";

export interface CourseCacheOptions {
  coursesPath: string;
  /** Defaults to every subdirectory of coursesPath */
  registry?: CourseRegistry;
  stat?: FileStat;
  clock?: Clock;
  logger?: Logger;
  /** Renderer for include entries with a template_context */
  templates?: TemplateRenderer;
  /** Template names are relative to this directory; defaults to coursesPath */
  templateRoot?: string;
  markup?: MarkupRenderer;
  linker?: StaticAssetLinker;
  /** Base static URL, e.g. "/static/" */
  staticUrl?: string;
  /** Prefixed to staticUrl, e.g. a scheme and host */
  staticUrlHostInject?: string;
  /** Language used when a course declares none */
  defaultLanguage?: string;
  /** Grader used for exercises without `configure` during post-processing */
  defaultGraderUrl?: string;
}

/**
 * Default language of a course document: the first of a `language` list,
 * a `language` string, then the same for `lang`, then the fallback.
 */
export function courseLanguage(document: ConfigMapping, fallback = FALLBACK_LANGUAGE): string {
  for (const field of ["language", "lang"]) {
    const value: ConfigValue | undefined = document[field];
    if (Array.isArray(value)) {
      const [first] = value;
      if (typeof first === "string" && first !== "") {
        return first;
      }
    } else if (typeof value === "string" && value !== "") {
      return value;
    }
  }
  return fallback;
}

export class CourseConfigCache {
  readonly coursesPath: string;
  readonly registry: CourseRegistry;

  private readonly stat: FileStat;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly includes: IncludeOptions;
  private readonly markup: MarkupRenderer | undefined;
  private readonly linker: StaticAssetLinker;
  private readonly staticUrl: string;
  private readonly staticUrlHostInject: string;
  private readonly defaultLanguage: string;
  private readonly defaultGraderUrl: string | undefined;

  private readonly courses = new Map<string, CourseConfig>();
  private dirMtime = 0;

  constructor(options: CourseCacheOptions) {
    this.coursesPath = options.coursesPath;
    this.registry = options.registry ?? new DirectoryCourseRegistry(options.coursesPath);
    this.stat = options.stat ?? nodeFileStat;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
    this.markup = options.markup;
    this.linker = options.linker ?? noopStaticLinker;
    this.staticUrl = options.staticUrl ?? "/static/";
    this.staticUrlHostInject = options.staticUrlHostInject ?? "";
    this.defaultLanguage = options.defaultLanguage ?? FALLBACK_LANGUAGE;
    this.defaultGraderUrl = options.defaultGraderUrl;
    this.includes = {
      templates: options.templates,
      templateRoot: options.templateRoot ?? options.coursesPath,
      logger: this.logger,
    };
  }

  get size(): number {
    return this.courses.size;
  }

  isFresh(recordedMtime: number, file: string): boolean {
    return isFresh(recordedMtime, file, this.stat);
  }

  /**
   * Drop one course, or every course when no key is given.
   */
  invalidate(courseKey?: string): void {
    if (courseKey === undefined) {
      this.courses.clear();
    } else {
      this.courses.delete(courseKey);
    }
  }

  /**
   * Get a course, loading it when it is not cached or its index changed.
   *
   * @returns undefined when the course has no index file
   * @throws ConfigError when the index is invalid
   */
  get(courseKey: string): CourseConfig | undefined {
    this.checkCoursesDirectory();

    const cached = this.courses.get(courseKey);
    if (cached !== undefined && this.isFresh(cached.mtime, cached.file)) {
      return cached;
    }

    const loaded = this.load(courseKey);
    if (loaded === undefined) {
      this.courses.delete(courseKey);
      return undefined;
    }
    this.courses.set(courseKey, loaded);
    this.linker.link(this.coursesPath, loaded.data);
    return loaded;
  }

  /**
   * Load every registered course. Courses that fail to load are logged and
   * left out.
   */
  all(): CourseConfig[] {
    for (const courseKey of this.registry.keys()) {
      try {
        this.get(courseKey);
      } catch (err) {
        if (!isConfigError(err)) {
          throw err;
        }
        this.logger.error(`Failed to load course: ${courseKey}`, { error: err.format() });
      }
    }
    return [...this.courses.values()];
  }

  courseAndExerciseConfigs(
    courseKey: string,
    exerciseKey: string
  ): [CourseConfig | undefined, ExerciseConfig | undefined] {
    const course = this.get(courseKey);
    if (course === undefined) {
      return [undefined, undefined];
    }
    return [course, course.exerciseConfig(exerciseKey)];
  }

  /**
   * Course metadata, from the cached course while it is fresh.
   */
  courseMeta(courseKey: string): CourseMeta {
    const cached = this.courses.get(courseKey);
    if (cached !== undefined && this.isFresh(cached.mtime, cached.file)) {
      return cached.meta;
    }
    return readCourseMeta(metaPath(this.registry.pathTo(courseKey)));
  }

  /**
   * Load every exercise config a course names directly and fill in default
   * grader settings.
   *
   * @returns undefined when the course does not exist or has no modules
   */
  postprocessed(courseKey: string): PostprocessResult | undefined {
    const course = this.get(courseKey);
    if (course?.course === undefined) {
      return undefined;
    }
    return postprocessCourse(course.course, {
      courseDir: course.dir,
      graderConfigDir: course.configDir,
      defaultLanguage: course.lang,
      defaultGraderUrl: this.defaultGraderUrl,
      exercise: { includes: this.includes, markup: this.markup, stat: this.stat, clock: this.clock },
      logger: this.logger,
    });
  }

  private checkCoursesDirectory(): void {
    let mtime: number;
    try {
      mtime = this.stat.mtime(this.coursesPath);
    } catch {
      return;
    }
    if (this.dirMtime < mtime) {
      if (this.courses.size > 0) {
        this.logger.debug("Courses directory changed, clearing course cache");
      }
      this.courses.clear();
      this.dirMtime = mtime;
    }
  }

  private exerciseContext(): ExerciseLoadContext {
    return {
      stat: this.stat,
      clock: this.clock,
      logger: this.logger,
      includes: this.includes,
      markup: this.markup,
    };
  }

  private load(courseKey: string): CourseConfig | undefined {
    this.logger.debug(`Loading course "${courseKey}"`);
    const dir = this.registry.pathTo(courseKey);
    const meta = readCourseMeta(metaPath(dir));
    const confDir = configDir(dir, meta);

    let file: string;
    try {
      file = getConfigPath(join(confDir, INDEX_FILE));
    } catch (err) {
      if (!isConfigError(err)) {
        throw err;
      }
      this.logger.debug(`No course index for "${courseKey}"`, { reason: err.message });
      return undefined;
    }

    const mtime = this.stat.mtime(file);
    const raw = resolveIncludes(parseConfigMapping(file), file, confDir, this.includes);
    const lang = courseLanguage(raw, this.defaultLanguage);
    const variants = processTags(raw, lang, { markup: this.markup, logger: this.logger });

    const data: ConfigMapping = { ...(variants[lang] ?? raw) };
    checkFields(file, data, ["name"]);
    data["key"] = courseKey;
    data["mtime"] = mtime;
    data["dir"] = dir;
    data["lang"] = lang;
    if (data["static_url"] === undefined) {
      data["static_url"] = `${this.staticUrlHostInject}${this.staticUrl}${courseKey}/`;
    }

    let course: Readonly<Course> | undefined;
    let warnings: ConfigIssue[] = [];
    let exercises: string[] = [];
    let configFiles: Record<string, string> = {};
    if (data["modules"] !== undefined) {
      const result = validateCourse(data);
      if (!result.success || result.course === undefined) {
        const issues = result.errors ?? [];
        throw new ConfigError(`Invalid course configuration in "${file}"`, { issues });
      }
      course = result.course;
      warnings = result.warnings ?? [];
      for (const warning of warnings) {
        this.logger.warn(`Course "${courseKey}": ${warning.message}`, { path: warning.path });
      }

      const refs = flattenExerciseRefs(course, data["exercise_types"]);
      exercises = refs.exercises;
      configFiles = refs.configFiles;
      data["exercises"] = [...exercises];
      data["config_files"] = { ...configFiles };
    }

    return new CourseConfig(
      {
        key: courseKey,
        meta,
        file,
        dir,
        configDir: confDir,
        mtime,
        ptime: this.clock(),
        data,
        variants,
        lang,
        course,
        warnings,
        exercises,
        configFiles,
      },
      this.exerciseContext()
    );
  }
}
