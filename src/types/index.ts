/**
 * Shared type foundations for the course configuration engine.
 */

export * from "./config-value.js";
