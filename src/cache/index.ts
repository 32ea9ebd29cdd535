export {
  CourseConfigCache,
  courseLanguage,
  FALLBACK_LANGUAGE,
  INDEX_FILE,
  type CourseCacheOptions,
} from "./course-cache.js";
export { CourseConfig, type CourseConfigInit, type ExerciseLoadContext } from "./course-config.js";
