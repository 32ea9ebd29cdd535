/**
 * Composition root.
 *
 * Builds the course cache and its collaborators from application
 * configuration. Hosts create one engine per process and share it.
 */

import { CourseConfigCache } from "./cache/index.js";
import { config, validateConfig, type AppConfig } from "./config/index.js";
import type { Clock, FileStat } from "./files/index.js";
import { createLogger, isLogLevel, type Logger } from "./logging/index.js";
import type { CourseRegistry } from "./registry/index.js";
import { noopStaticLinker, SymlinkStaticLinker, type StaticAssetLinker } from "./static/index.js";
import type { MarkupRenderer } from "./tags/index.js";
import { FileTemplateRenderer, type TemplateRenderer } from "./templates/index.js";

export interface EngineOverrides {
  logger?: Logger;
  registry?: CourseRegistry;
  markup?: MarkupRenderer;
  templates?: TemplateRenderer;
  linker?: StaticAssetLinker;
  stat?: FileStat;
  clock?: Clock;
}

export interface Engine {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly cache: CourseConfigCache;
}

/**
 * Validate configuration and wire the course cache.
 *
 * @throws ConfigError when the configuration is invalid
 */
export function createEngine(appConfig: AppConfig = config, overrides: EngineOverrides = {}): Engine {
  validateConfig(appConfig);

  const logger =
    overrides.logger ??
    createLogger({
      level: isLogLevel(appConfig.logLevel) ? appConfig.logLevel : "info",
      name: appConfig.appName,
      file: appConfig.logToFile,
    });

  const linker =
    overrides.linker ??
    (appConfig.staticRoot !== undefined
      ? new SymlinkStaticLinker(appConfig.staticRoot, logger.child("static"))
      : noopStaticLinker);

  const cache = new CourseConfigCache({
    coursesPath: appConfig.coursesPath,
    registry: overrides.registry,
    stat: overrides.stat,
    clock: overrides.clock,
    logger: logger.child("config"),
    templates: overrides.templates ?? new FileTemplateRenderer(appConfig.templateRoot),
    templateRoot: appConfig.templateRoot,
    markup: overrides.markup,
    linker,
    staticUrl: appConfig.staticUrl,
    staticUrlHostInject: appConfig.staticUrlHostInject,
    defaultLanguage: appConfig.defaultLanguage,
    defaultGraderUrl: appConfig.defaultGraderUrl,
  });

  logger.debug("Engine created", { coursesPath: appConfig.coursesPath, env: appConfig.env });
  return { config: appConfig, logger, cache };
}
