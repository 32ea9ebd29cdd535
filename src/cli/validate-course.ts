#!/usr/bin/env node
/**
 * CLI command to validate course configuration.
 *
 * Loads every course (or one) from the courses directory, validates its
 * index, and loads every exercise config it lists.
 *
 * Usage:
 *   npx tsx src/cli/validate-course.ts [options]
 *
 * Options:
 *   --courses <path>    Courses directory (default: COURSES_PATH or ./courses)
 *   --course <key>      Validate only this course
 *   --exercise <key>    Also show this exercise's record (needs --course)
 *   --lang <code>       Language of the shown exercise record
 *   --verbose           Log loading details
 *   --json              Output the report as JSON (for CI parsing)
 *   -h, --help          Show help
 *
 * Exit codes:
 *   0 - Every course loaded
 *   1 - One or more courses failed
 */

import { realpathSync } from "node:fs";
import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";

import type { CourseConfig, CourseConfigCache } from "../cache/index.js";
import { config } from "../config/index.js";
import { createEngine } from "../engine.js";
import { isConfigError, type ConfigIssue } from "../errors.js";
import { createLogger } from "../logging/index.js";
import type { ConfigValue } from "../types/index.js";

// ============================================================
// Types
// ============================================================

export interface ExerciseSummary {
  key: string;
  lang: string;
  title: ConfigValue;
}

export interface CourseReport {
  key: string;
  success: boolean;
  file?: string;
  lang?: string;
  exerciseCount: number;
  errors: string[];
  warnings: string[];
  exercise?: ExerciseSummary;
}

export interface ValidationReport {
  timestamp: string;
  courses: CourseReport[];
  summary: {
    passed: number;
    failed: number;
    total: number;
    warnings: number;
  };
}

export interface CheckOptions {
  exercise?: string;
  lang?: string;
}

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      courses: { type: "string", default: config.coursesPath },
      course: { type: "string" },
      exercise: { type: "string" },
      lang: { type: "string" },
      verbose: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: validate-course [options]

Options:
  --courses <path>    Courses directory (default: ${config.coursesPath})
  --course <key>      Validate only this course
  --exercise <key>    Also show this exercise's record (needs --course)
  --lang <code>       Language of the shown exercise record
  --verbose           Log loading details
  --json              Output the report as JSON (for CI parsing)
  -h, --help          Show this help message
`);
    process.exit(0);
  }

  return values;
}

// ============================================================
// Checks
// ============================================================

function formatIssue(issue: ConfigIssue): string {
  return `${issue.path}: ${issue.message}`;
}

/**
 * Report lines for a failed load.
 */
export function describeError(err: unknown): string[] {
  if (isConfigError(err)) {
    if (err.issues.length > 0) {
      return err.issues.map(formatIssue);
    }
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : "";
    return [`${err.message}${cause}`];
  }
  return [err instanceof Error ? err.message : String(err)];
}

function summarizeExercise(course: CourseConfig, options: CheckOptions): ExerciseSummary | undefined {
  if (options.exercise === undefined) {
    return undefined;
  }
  const data = course.exerciseData(options.exercise, options.lang);
  if (data === undefined) {
    return undefined;
  }
  const lang = data["lang"];
  return {
    key: options.exercise,
    lang: typeof lang === "string" ? lang : course.lang,
    title: data["title"] ?? null,
  };
}

/**
 * Load one course and every exercise it lists.
 */
export function checkCourse(cache: CourseConfigCache, key: string, options: CheckOptions = {}): CourseReport {
  const report: CourseReport = { key, success: false, exerciseCount: 0, errors: [], warnings: [] };

  try {
    const course = cache.get(key);
    if (course === undefined) {
      report.errors.push("No course index found");
      return report;
    }
    report.file = course.file;
    report.lang = course.lang;
    report.warnings = course.warnings.map(formatIssue);
    report.exerciseCount = course.getExerciseList().length;

    if (options.exercise !== undefined) {
      report.exercise = summarizeExercise(course, options);
      if (report.exercise === undefined) {
        report.errors.push(`Exercise "${options.exercise}" is not listed in the course`);
        return report;
      }
    }
    report.success = true;
  } catch (err) {
    if (!isConfigError(err)) {
      throw err;
    }
    report.errors.push(...describeError(err));
  }
  return report;
}

export function buildReport(courses: CourseReport[], now: Date = new Date()): ValidationReport {
  const passed = courses.filter((course) => course.success).length;
  return {
    timestamp: now.toISOString(),
    courses,
    summary: {
      passed,
      failed: courses.length - passed,
      total: courses.length,
      warnings: courses.reduce((sum, course) => sum + course.warnings.length, 0),
    },
  };
}

// ============================================================
// Output Formatting
// ============================================================

/**
 * Plain-text report, one course per block.
 */
export function formatReport(report: ValidationReport): string[] {
  const lines: string[] = [];
  for (const course of report.courses) {
    const mark = course.success ? "✓" : "✗";
    const detail = course.success ? `${course.exerciseCount} exercise(s), lang ${course.lang ?? "?"}` : "failed";
    lines.push(`${mark} ${course.key}: ${detail}`);
    for (const error of course.errors) {
      lines.push(`    • ${error}`);
    }
    for (const warning of course.warnings) {
      lines.push(`    ! ${warning}`);
    }
    if (course.exercise !== undefined) {
      lines.push(`    ${course.exercise.key} [${course.exercise.lang}]: ${JSON.stringify(course.exercise.title)}`);
    }
  }

  lines.push("─".repeat(60));
  const { passed, failed, total, warnings } = report.summary;
  lines.push(
    failed === 0
      ? `✓ All courses loaded (${passed}/${total}), ${warnings} warning(s)`
      : `✗ ${failed} of ${total} course(s) failed, ${warnings} warning(s)`
  );
  return lines;
}

// ============================================================
// Main
// ============================================================

function main(): void {
  const values = parseCliArgs();
  const coursesPath = resolve(values.courses);

  const logger = createLogger({ level: values.verbose ? "debug" : "warn", name: "validate-course" });
  const { cache } = createEngine({ ...config, coursesPath, templateRoot: coursesPath }, { logger });

  const keys = values.course !== undefined ? [values.course] : cache.registry.keys();
  const options: CheckOptions = { exercise: values.exercise, lang: values.lang };
  const report = buildReport(keys.map((key) => checkCourse(cache, key, options)));

  if (values.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    for (const line of formatReport(report)) {
      console.log(line);
    }
  }

  process.exitCode = report.summary.failed > 0 ? 1 : 0;
}

/**
 * True when `scriptPath` (argv[1]) is this module, also through a bin symlink.
 */
export function isEntryPoint(moduleUrl: string, scriptPath: string | undefined): boolean {
  if (scriptPath === undefined) {
    return false;
  }
  let resolved: string;
  try {
    resolved = realpathSync(scriptPath);
  } catch {
    return false;
  }
  return pathToFileURL(resolved).href === moduleUrl;
}

// Only run when executed directly (not imported by tests)
if (isEntryPoint(import.meta.url, process.argv[1])) {
  try {
    main();
  } catch (err: unknown) {
    for (const line of describeError(err)) {
      console.error(`Error: ${line}`);
    }
    process.exit(1);
  }
}
