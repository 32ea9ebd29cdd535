/**
 * Course post-processing: load the exercise config of every exercise that
 * names one and fill in default grader settings.
 */

import { ExerciseConfig, locateExerciseConfig, type LoadExerciseOptions } from "../exercises/index.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { isConfigMapping } from "../types/index.js";
import { isGradedItem, type ConfigureOptions, type Course, type Item } from "./schema.js";
import { mapItems } from "./tree.js";

export interface PostprocessOptions {
  courseDir: string;
  /** Directory exercise config paths without a leading `/` are relative to */
  graderConfigDir: string;
  defaultLanguage: string;
  /** Grader used by exercises that do not declare `configure` */
  defaultGraderUrl?: string;
  /** Passed through to ExerciseConfig.load */
  exercise?: Pick<LoadExerciseOptions, "includes" | "markup" | "stat" | "clock">;
  logger?: Logger;
}

export interface PostprocessResult {
  course: Course;
  /** Exercise key → loaded config */
  exercises: Map<string, ExerciseConfig>;
}

/**
 * Default grader settings for an exercise config: the grader URL, and the
 * container mount of the first language version exposed under its own name.
 */
export function defaultConfigure(config: ExerciseConfig, graderUrl: string): ConfigureOptions {
  const [first] = Object.values(config.data);
  const container = first?.["container"];
  const mount = isConfigMapping(container) ? container["mount"] : undefined;
  return {
    url: graderUrl,
    files: typeof mount === "string" && mount.length > 0 ? { [mount]: mount } : {},
  };
}

/**
 * Load exercise configs and derive `configure` where missing.
 *
 * @returns A new course; the input is not modified
 * @throws ConfigError when an exercise config cannot be loaded
 */
export function postprocessCourse(course: Readonly<Course>, options: PostprocessOptions): PostprocessResult {
  const logger = options.logger ?? silentLogger;
  const exercises = new Map<string, ExerciseConfig>();

  const transform = (item: Item): Item => {
    if (!isGradedItem(item) || item.config === undefined) {
      return item;
    }

    logger.debug(`Loading exercise "${options.courseDir}/${item.key}"`);
    const config = ExerciseConfig.load({
      ...options.exercise,
      ...locateExerciseConfig(item.config, options.courseDir, options.graderConfigDir),
      exerciseKey: item.key,
      defaultLanguage: options.defaultLanguage,
      logger,
    });
    exercises.set(item.key, config);

    if (item.configure === undefined && options.defaultGraderUrl !== undefined) {
      return { ...item, configure: defaultConfigure(config, options.defaultGraderUrl) };
    }
    return item;
  };

  return { course: mapItems(course, transform), exercises };
}
