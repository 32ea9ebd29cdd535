/**
 * File location, parsing and metadata.
 */

export {
  CONFIG_FORMATS,
  formatOf,
  isConfigFormat,
  parseConfigText,
  parseConfigFile,
  parseConfigMapping,
  checkFields,
  type ConfigFormat,
} from "./parser.js";
export { getConfigPath } from "./locator.js";
export { readCourseMeta, configDir, metaPath, META_FILE, type CourseMeta } from "./meta.js";
export { nodeFileStat, systemClock, isFresh, type FileStat, type Clock } from "./stat.js";
