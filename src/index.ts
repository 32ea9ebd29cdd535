/**
 * Course configuration engine.
 *
 * Usage:
 *   const { cache } = createEngine();
 *   const course = cache.get("programming-1");
 *   const exercise = course?.exerciseData("hello_world", "en");
 */

export { createEngine, type Engine, type EngineOverrides } from "./engine.js";
export { ConfigError, isConfigError, type ConfigIssue, type ConfigErrorOptions } from "./errors.js";
export { config, loadConfig, validateConfig, DEFAULT_LANGUAGE, type AppConfig } from "./config/index.js";
export { createLogger, silentLogger, type Logger, type LogLevel, type LoggerOptions } from "./logging/index.js";
export * from "./cache/index.js";
export * from "./course/index.js";
export * from "./exercises/index.js";
export * from "./files/index.js";
export * from "./includes/index.js";
export * from "./registry/index.js";
export * from "./static/index.js";
export * from "./tags/index.js";
export * from "./templates/index.js";
export * from "./types/index.js";
