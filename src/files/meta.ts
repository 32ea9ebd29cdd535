/**
 * Course metadata file.
 *
 * `<course dir>/apps.meta` holds KEY=VALUE lines written by the course
 * repository tooling. `grader_config` names the subdirectory that exercise
 * configs are resolved against.
 */

import { readFileSync } from "node:fs";
import { join } from "node:path";
import { parse } from "dotenv";
import { ConfigError } from "../errors.js";

export const META_FILE = "apps.meta";

export type CourseMeta = Readonly<Record<string, string>>;

/**
 * Read a metadata file. A missing file yields empty metadata.
 */
export function readCourseMeta(filePath: string): CourseMeta {
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return {};
    }
    throw new ConfigError(`Cannot read course metadata "${filePath}"`, { cause: err });
  }
  return Object.freeze(parse(text));
}

/**
 * Directory that exercise configs of a course are resolved against.
 */
export function configDir(courseDir: string, meta: CourseMeta): string {
  const graderConfig = meta["grader_config"];
  return graderConfig !== undefined && graderConfig !== "" ? join(courseDir, graderConfig) : courseDir;
}

export function metaPath(courseDir: string): string {
  return join(courseDir, META_FILE);
}
