/**
 * Static asset exposure.
 *
 * After a course loads, its `static_dir` is linked under the static root as
 * `<staticRoot>/<course key>` so a web server can serve it.
 */

import { lstatSync, mkdirSync, readlinkSync, symlinkSync, unlinkSync } from "node:fs";
import { join, resolve } from "node:path";
import { ConfigError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/index.js";
import type { ConfigMapping } from "../types/index.js";

export interface StaticAssetLinker {
  link(coursesPath: string, course: Readonly<ConfigMapping>): void;
}

export const noopStaticLinker: StaticAssetLinker = {
  link: () => undefined,
};

function currentTarget(linkPath: string): string | undefined {
  const stats = lstatSync(linkPath, { throwIfNoEntry: false });
  if (stats === undefined) {
    return undefined;
  }
  if (!stats.isSymbolicLink()) {
    throw new ConfigError(`Static path "${linkPath}" exists and is not a symbolic link`);
  }
  return readlinkSync(linkPath);
}

export class SymlinkStaticLinker implements StaticAssetLinker {
  private readonly logger: Logger;

  constructor(
    private readonly staticRoot: string,
    logger: Logger = silentLogger
  ) {
    this.logger = logger;
  }

  link(coursesPath: string, course: Readonly<ConfigMapping>): void {
    const key = course["key"];
    const staticDir = course["static_dir"];
    if (typeof key !== "string" || typeof staticDir !== "string" || staticDir === "") {
      return;
    }

    const courseDir = typeof course["dir"] === "string" ? course["dir"] : join(coursesPath, key);
    const target = resolve(courseDir, staticDir);
    const linkPath = join(this.staticRoot, key);

    try {
      const existing = currentTarget(linkPath);
      if (existing === target) {
        return;
      }
      mkdirSync(this.staticRoot, { recursive: true });
      if (existing !== undefined) {
        unlinkSync(linkPath);
      }
      symlinkSync(target, linkPath, "dir");
    } catch (err) {
      if (err instanceof ConfigError) {
        throw err;
      }
      throw new ConfigError(`Failed to link static files of course "${key}"`, { cause: err });
    }
    this.logger.debug(`Linked static files of "${key}"`, { target, link: linkPath });
  }
}
