/**
 * Course structure validator.
 *
 * Turns the raw course index (after includes and tag processing) into the
 * typed Course tree, collecting every problem instead of stopping at the
 * first one.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * VALIDATION ORDER
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * 1. NODE FIELDS: each course, module and item node is normalized and
 *    checked against its schema (presence, types, unknown item fields).
 *
 * 2. ITEM RULES: checked per node while parsing
 *    - `name` and legacy `title` are mutually exclusive
 *    - assistant grading requires assistant viewing
 *    - static content paths are relative
 *
 * 3. TREE RULES: need the whole tree, so only run when 1 and 2 pass
 *    - module keys are unique
 *    - learning object keys are unique across all modules
 *    - every item category is declared in `categories`, at any depth
 *
 * 4. DATES: module close after course end and late close before close
 *    are warnings; the course still loads.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import type { ZodIssue } from "zod";
import { ConfigError, type ConfigIssue } from "../errors.js";
import { isConfigMapping } from "../types/index.js";
import {
  ChapterSchema,
  classifyItem,
  CourseSchema,
  ExerciseCollectionSchema,
  ExerciseSchema,
  LtiExerciseSchema,
  ModuleSchema,
  type Course,
  type Item,
  type Module,
} from "./schema.js";
import { walkItems } from "./tree.js";

/**
 * Result of course validation.
 */
export interface CourseValidationResult {
  success: boolean;
  course?: Readonly<Course>;
  errors?: ConfigIssue[];
  warnings?: ConfigIssue[];
}

/** Fields dropped from every node before validation. */
const DEPRECATED_FIELDS = ["scale_points"];

type RawNode = Record<string, unknown>;

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

function joinPath(base: string, segments: readonly (string | number)[]): string {
  const parts = [base, ...segments.map(String)].filter((part) => part.length > 0);
  return parts.length > 0 ? parts.join(".") : "(root)";
}

function error(path: string, message: string, code: string): ConfigIssue {
  return { path, message, code, severity: "error" };
}

function warning(path: string, message: string, code: string): ConfigIssue {
  return { path, message, code, severity: "warning" };
}

function fromZod(base: string, issues: readonly ZodIssue[]): ConfigIssue[] {
  return issues.map((issue) => error(joinPath(base, issue.path), issue.message, issue.code));
}

/**
 * Drop private (`_`-prefixed) and deprecated fields, rename legacy ones.
 */
function normalizeNode(
  raw: unknown,
  path: string,
  errors: ConfigIssue[],
  renames: Readonly<Record<string, string>>
): RawNode | undefined {
  if (!isConfigMapping(raw)) {
    errors.push(error(joinPath(path, []), "Expected a mapping", "invalid_type"));
    return undefined;
  }

  const node: RawNode = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!key.startsWith("_") && !DEPRECATED_FIELDS.includes(key)) {
      node[key] = value;
    }
  }

  for (const [legacy, current] of Object.entries(renames)) {
    if (!(legacy in node)) {
      continue;
    }
    if (current in node) {
      errors.push(
        error(joinPath(path, [legacy]), `Only one of ${current} and ${legacy} should be specified`, "conflicting_fields")
      );
      return undefined;
    }
    node[current] = node[legacy];
    delete node[legacy];
  }

  return node;
}

function rawChildren(node: RawNode, path: string, errors: ConfigIssue[]): unknown[] {
  const children = node["children"];
  if (children === undefined || children === null) {
    return [];
  }
  if (!Array.isArray(children)) {
    errors.push(error(joinPath(path, ["children"]), "Expected a list", "invalid_type"));
    return [];
  }
  return children;
}

function parseItems(rawItems: readonly unknown[], path: string, errors: ConfigIssue[]): Item[] {
  const items: Item[] = [];
  rawItems.forEach((raw, index) => {
    const item = parseItem(raw, `${path}.children.${index}`, errors);
    if (item !== undefined) {
      items.push(item);
    }
  });
  return items;
}

function parseItem(raw: unknown, path: string, errors: ConfigIssue[]): Item | undefined {
  const node = normalizeNode(raw, path, errors, { title: "name" });
  if (node === undefined) {
    return undefined;
  }
  // Children are checked even when the node itself is invalid.
  const children = parseItems(rawChildren(node, path, errors), path, errors);

  switch (classifyItem(node)) {
    case "chapter": {
      const result = ChapterSchema.safeParse(node);
      if (!result.success) {
        errors.push(...fromZod(path, result.error.issues));
        return undefined;
      }
      return { ...result.data, kind: "chapter", children };
    }
    case "lti_exercise": {
      const result = LtiExerciseSchema.safeParse(node);
      if (!result.success) {
        errors.push(...fromZod(path, result.error.issues));
        return undefined;
      }
      return { ...result.data, kind: "lti_exercise", children };
    }
    case "exercise_collection": {
      const result = ExerciseCollectionSchema.safeParse(node);
      if (!result.success) {
        errors.push(...fromZod(path, result.error.issues));
        return undefined;
      }
      return { ...result.data, kind: "exercise_collection", children };
    }
    case "exercise": {
      const result = ExerciseSchema.safeParse(node);
      if (!result.success) {
        errors.push(...fromZod(path, result.error.issues));
        return undefined;
      }
      return { ...result.data, kind: "exercise", children };
    }
  }
}

function parseModule(raw: unknown, path: string, errors: ConfigIssue[]): Module | undefined {
  const node = normalizeNode(raw, path, errors, { title: "name", "read-open": "read_open" });
  if (node === undefined) {
    return undefined;
  }
  const children = parseItems(rawChildren(node, path, errors), path, errors);

  const result = ModuleSchema.safeParse(node);
  if (!result.success) {
    errors.push(...fromZod(path, result.error.issues));
    return undefined;
  }
  return { ...result.data, children };
}

// ---------------------------------------------------------------------------
// Tree rules
// ---------------------------------------------------------------------------

function validateModuleKeys(course: Course): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  const seen = new Set<string>();
  course.modules.forEach((module, index) => {
    if (seen.has(module.key)) {
      issues.push(error(`modules.${index}.key`, `Duplicate module key: ${module.key}`, "duplicate_module_key"));
    }
    seen.add(module.key);
  });
  return issues;
}

function validateItemKeys(course: Course): ConfigIssue[] {
  const seen = new Set<string>();
  const duplicates: string[] = [];
  walkItems(course, ({ item }) => {
    if (seen.has(item.key) && !duplicates.includes(item.key)) {
      duplicates.push(item.key);
    }
    seen.add(item.key);
  });

  if (duplicates.length === 0) {
    return [];
  }
  return [
    error(
      "modules",
      `Duplicate learning object (chapter, exercise) keys: ${duplicates.join(", ")}`,
      "duplicate_item_key"
    ),
  ];
}

function validateCategories(course: Course): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  const reported = new Set<string>();
  walkItems(course, ({ item, path }) => {
    if (!Object.hasOwn(course.categories, item.category) && !reported.has(item.category)) {
      reported.add(item.category);
      issues.push(
        error(`${path}.category`, `Category not found in categories: ${item.category}`, "undeclared_category")
      );
    }
  });
  return issues;
}

function validateModuleDates(course: Course): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  course.modules.forEach((module, index) => {
    if (module.close !== undefined && course.end !== undefined && module.close.getTime() > course.end.getTime()) {
      issues.push(warning(`modules.${index}.close`, "Course ends before module closes", "close_after_end"));
    }
    if (module.late_close !== undefined) {
      const close = module.close ?? course.end;
      if (close !== undefined && module.late_close.getTime() < close.getTime()) {
        issues.push(warning(`modules.${index}.late_close`, "'late_close' is before 'close'", "late_close_before_close"));
      }
    }
  });
  return issues;
}

/**
 * Validate a course index document.
 *
 * @param input - Course document after include and tag processing
 */
export function validateCourse(input: unknown): CourseValidationResult {
  const errors: ConfigIssue[] = [];

  const result = CourseSchema.safeParse(input);
  if (!result.success) {
    return { success: false, errors: fromZod("", result.error.issues) };
  }

  const modules: Module[] = [];
  result.data.modules.forEach((raw, index) => {
    const module = parseModule(raw, `modules.${index}`, errors);
    if (module !== undefined) {
      modules.push(module);
    }
  });
  if (errors.length > 0) {
    return { success: false, errors };
  }

  const course: Course = { ...result.data, modules };
  errors.push(...validateModuleKeys(course), ...validateItemKeys(course), ...validateCategories(course));
  if (errors.length > 0) {
    return { success: false, errors };
  }

  const warnings = validateModuleDates(course);
  return {
    success: true,
    course: deepFreeze(course),
    warnings,
  };
}

/**
 * Validate a course document, throwing on failure.
 *
 * @throws ConfigError carrying every error issue
 */
export function loadCourseOrThrow(input: unknown, source = "course"): Readonly<Course> {
  const result = validateCourse(input);
  if (!result.success || result.course === undefined) {
    const issues = result.errors ?? [];
    throw new ConfigError(`Invalid course configuration in "${source}" (${issues.length} issue(s))`, { issues });
  }
  return result.course;
}
