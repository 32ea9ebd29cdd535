export {
  ExerciseConfig,
  locateExerciseConfig,
  ROOT_LANGUAGE,
  REQUIRED_EXERCISE_FIELDS,
  type ExerciseConfigInit,
  type LoadExerciseOptions,
} from "./exercise-config.js";
