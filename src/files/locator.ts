/**
 * Config file locator.
 *
 * A logical config path may omit its extension ("exercises/hello" for
 * "exercises/hello.yaml"). Exactly one candidate may exist.
 */

import { statSync } from "node:fs";
import { dirname } from "node:path";
import { ConfigError } from "../errors.js";
import { CONFIG_FORMATS, formatOf } from "./parser.js";

function isFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}

function isDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

/**
 * Return the full path of the config file identified by a path.
 *
 * @param path - Path to a config file, possibly without a suffix
 * @throws ConfigError if none or several supported files exist
 */
export function getConfigPath(path: string): string {
  if (isFile(path) && formatOf(path) !== undefined) {
    return path;
  }

  let configFile: string | undefined;
  if (isDirectory(dirname(path))) {
    for (const ext of CONFIG_FORMATS) {
      const candidate = `${path}.${ext}`;
      if (isFile(candidate)) {
        if (configFile !== undefined) {
          throw new ConfigError(`Multiple config files for "${path}"`);
        }
        configFile = candidate;
      }
    }
  }

  if (configFile === undefined) {
    throw new ConfigError(`No supported config at "${path}"`);
  }
  return configFile;
}
