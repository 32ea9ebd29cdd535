export {
  CourseRecordSchema,
  DirectoryCourseRegistry,
  StaticCourseRegistry,
  type CourseRecord,
  type CourseRegistry,
} from "./registry.js";
