export {
  resolveIncludes,
  parseIncludeEntry,
  INCLUDE_KEY,
  type IncludeEntry,
  type IncludeOptions,
} from "./resolver.js";
