/**
 * Application configuration.
 * Validates and exposes typed configuration values.
 */

import { resolve } from "node:path";
import { ConfigError } from "../errors.js";
import { maybeEnv, optionalEnv, optionalEnvBool } from "./env.js";

export { optionalEnv, optionalEnvBool, maybeEnv } from "./env.js";

/** Language used when a course declares none. */
export const DEFAULT_LANGUAGE = "en";

export interface AppConfig {
  /** Current environment (development, production, test) */
  readonly env: string;
  /** Enable debug mode */
  readonly debug: boolean;
  /** Log level */
  readonly logLevel: string;
  /** Application name, used as the root logger name */
  readonly appName: string;
  /** Directory holding one subdirectory per course */
  readonly coursesPath: string;
  /** URL prefix for course static assets */
  readonly staticUrl: string;
  /** Host part prepended to staticUrl (empty for same-origin) */
  readonly staticUrlHostInject: string;
  /** Directory where course static directories are linked, if any */
  readonly staticRoot?: string;
  /** Grader URL used for exercises that configure none */
  readonly defaultGraderUrl?: string;
  /** Root that include templates are named relative to */
  readonly templateRoot: string;
  /** Fallback language for courses without a language field */
  readonly defaultLanguage: string;
  /** Also write log entries to a file */
  readonly logToFile: boolean;
}

/**
 * Load application configuration from the environment.
 */
export function loadConfig(): AppConfig {
  const coursesPath = resolve(optionalEnv("COURSES_PATH", "courses"));
  const staticRoot = maybeEnv("STATIC_ROOT");
  return Object.freeze({
    env: optionalEnv("NODE_ENV", "development"),
    debug: optionalEnvBool("DEBUG", false),
    logLevel: optionalEnv("LOG_LEVEL", "info"),
    appName: optionalEnv("APP_NAME", "course-config"),
    coursesPath,
    staticUrl: optionalEnv("STATIC_URL", "/static/"),
    staticUrlHostInject: optionalEnv("STATIC_URL_HOST_INJECT", ""),
    staticRoot: staticRoot !== undefined ? resolve(staticRoot) : undefined,
    defaultGraderUrl: maybeEnv("DEFAULT_GRADER_URL"),
    templateRoot: resolve(optionalEnv("TEMPLATE_ROOT", coursesPath)),
    defaultLanguage: optionalEnv("DEFAULT_LANG", DEFAULT_LANGUAGE),
    logToFile: optionalEnvBool("LOG_TO_FILE", false),
  });
}

/** Application configuration singleton */
export const config: AppConfig = loadConfig();

/**
 * Validate configuration values that have no safe default.
 * Call this at application startup to fail fast.
 */
export function validateConfig(appConfig: AppConfig = config): void {
  if (!["development", "production", "test"].includes(appConfig.env)) {
    throw new ConfigError(
      `Invalid NODE_ENV: ${appConfig.env}. Must be development, production, or test.`
    );
  }

  if (!["debug", "info", "warn", "error"].includes(appConfig.logLevel)) {
    throw new ConfigError(
      `Invalid LOG_LEVEL: ${appConfig.logLevel}. Must be debug, info, warn, or error.`
    );
  }

  if (!appConfig.staticUrl.endsWith("/")) {
    throw new ConfigError(`Invalid STATIC_URL: ${appConfig.staticUrl}. Must end with "/".`);
  }

  if (!/^[a-z]{2,3}(-[A-Za-z0-9]+)?$/.test(appConfig.defaultLanguage)) {
    throw new ConfigError(`Invalid DEFAULT_LANG: ${appConfig.defaultLanguage}.`);
  }
}
