/**
 * Course tree model, validation and post-processing.
 */

export {
  classifyItem,
  isGradedItem,
  localized,
  parseCourseDate,
  ChapterSchema,
  ConfigureOptionsSchema,
  CourseDate,
  CourseSchema,
  Duration,
  ExerciseCollectionSchema,
  ExerciseSchema,
  ItemKey,
  ITEM_SCHEMAS,
  LocalizedString,
  LtiExerciseSchema,
  ModuleSchema,
  type ChapterItem,
  type ConfigureOptions,
  type Course,
  type ExerciseCollectionItem,
  type ExerciseItem,
  type GradedItem,
  type Item,
  type ItemKind,
  type Localized,
  type LtiExerciseItem,
  type Module,
} from "./schema.js";
export {
  collectItemCategories,
  collectItemKeys,
  flattenExerciseRefs,
  mapItems,
  walkItems,
  type ExerciseRefs,
  type ItemVisit,
} from "./tree.js";
export { validateCourse, loadCourseOrThrow, type CourseValidationResult } from "./validator.js";
export {
  postprocessCourse,
  defaultConfigure,
  type PostprocessOptions,
  type PostprocessResult,
} from "./postprocess.js";
