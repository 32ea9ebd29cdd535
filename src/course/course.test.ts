/**
 * Tests for the course tree model, validation and post-processing.
 *
 * Run: node --import tsx src/course/course.test.ts
 *
 * Tests cover:
 *   1. Dates and durations
 *   2. Node schemas and normalization
 *   3. Tree rules (duplicate keys, undeclared categories)
 *   4. Date warnings
 *   5. Tree walkers and exercise flattening
 *   6. Post-processing with exercise configs on disk
 */

import { strict as assert } from "node:assert";
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { ConfigError } from "../errors.js";
import {
  collectItemCategories,
  collectItemKeys,
  Duration,
  flattenExerciseRefs,
  loadCourseOrThrow,
  parseCourseDate,
  postprocessCourse,
  validateCourse,
  type Course,
  type Item,
} from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function courseDocument(modules: unknown[], extra: Record<string, unknown> = {}): Record<string, unknown> {
  return { name: "Demo course", categories: { hw: {}, lab: {} }, modules, ...extra };
}

function moduleDocument(key: string, children: unknown[], extra: Record<string, unknown> = {}) {
  return { key, name: `Module ${key}`, children, ...extra };
}

function valid(document: unknown): Readonly<Course> {
  const result = validateCourse(document);
  if (!result.success || result.course === undefined) {
    throw new Error(`unexpected errors: ${JSON.stringify(result.errors)}`);
  }
  return result.course;
}

function child(items: readonly Item[], index: number): Item {
  const item = items[index];
  assert.ok(item !== undefined, `no item at ${index}`);
  return item;
}

// ═══════════════════════════════════════════════════════════════════════════
// DATES
// ═══════════════════════════════════════════════════════════════════════════

section("Dates and durations");

test("date-only values are midnight UTC", () => {
  assert.equal(parseCourseDate("2024-01-15")?.toISOString(), "2024-01-15T00:00:00.000Z");
});

test("times without an offset are UTC", () => {
  assert.equal(parseCourseDate("2024-01-15 12:30")?.toISOString(), "2024-01-15T12:30:00.000Z");
});

test("offsets are applied", () => {
  assert.equal(parseCourseDate("2024-01-15T12:30:00+02:00")?.toISOString(), "2024-01-15T10:30:00.000Z");
  assert.equal(parseCourseDate("2024-01-15 12:30:00+0200")?.toISOString(), "2024-01-15T10:30:00.000Z");
});

test("numbers are epoch seconds", () => {
  assert.equal(parseCourseDate(86400)?.toISOString(), "1970-01-02T00:00:00.000Z");
});

test("impossible and malformed dates are rejected", () => {
  assert.equal(parseCourseDate("2024-02-30"), undefined);
  assert.equal(parseCourseDate("next monday"), undefined);
});

test("durations are seconds or <int><unit>", () => {
  assert.equal(Duration.safeParse(3600).success, true);
  assert.equal(Duration.safeParse("3d").success, true);
  assert.equal(Duration.safeParse("3 days").success, false);
  assert.equal(Duration.safeParse("").success, false);
});

// ═══════════════════════════════════════════════════════════════════════════
// NODE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════

section("Node schemas");

test("items are classified by their distinguishing fields", () => {
  const course = valid(
    courseDocument([
      moduleDocument("m1", [
        { key: "intro", category: "hw", static_content: "m1/intro.rst" },
        { key: "ex1", category: "hw", config: "exercises/ex1", children: [{ key: "tool", category: "lab", lti: "quiz", lti_aplus_get_and_post: true }] },
        { key: "bonus", category: "hw", target_category: "lab", target_url: "https://lms.test/", max_points: 10 },
      ]),
    ])
  );
  const [module] = course.modules;
  assert.ok(module !== undefined);
  assert.equal(module.status, "ready");

  const exercise = child(module.children, 1);
  assert.deepEqual(
    module.children.map((item) => item.kind),
    ["chapter", "exercise", "exercise_collection"]
  );
  const tool = child(exercise.children, 0);
  assert.equal(tool.kind, "lti_exercise");
  assert.equal(tool.kind === "lti_exercise" ? tool.lti_aplus_get_and_post : undefined, true);
  assert.equal(exercise.kind === "exercise" ? exercise.max_submissions : -1, 0);
});

test("LTI items reject unknown LTI fields", () => {
  const result = validateCourse(
    courseDocument([moduleDocument("m1", [{ key: "l1", category: "lab", lti: "tool", lti_get_and_post: true }])])
  );
  assert.equal(result.success, false);
  assert.deepEqual(
    result.errors?.map((issue) => issue.path),
    ["modules.0.children.0"]
  );
});

test("numeric keys become strings", () => {
  const course = valid(courseDocument([moduleDocument("m1", [{ key: 7, category: "hw" }])]));
  assert.equal(child(course.modules[0]?.children ?? [], 0).key, "7");
});

test("legacy title becomes name, private and deprecated fields are dropped", () => {
  const course = valid(
    courseDocument([
      moduleDocument("m1", [{ key: "ex1", category: "hw", title: "Old", _note: "x", scale_points: 5 }]),
    ])
  );
  assert.equal(child(course.modules[0]?.children ?? [], 0).name, "Old");
});

test("a module accepts read-open", () => {
  const course = valid(courseDocument([moduleDocument("m1", [], { "read-open": "2024-01-01" })]));
  assert.equal(course.modules[0]?.read_open?.toISOString(), "2024-01-01T00:00:00.000Z");
});

test("name and title together are an error", () => {
  const result = validateCourse(
    courseDocument([moduleDocument("m1", [{ key: "ex1", category: "hw", name: "A", title: "B" }])])
  );
  assert.equal(result.success, false);
  assert.deepEqual(result.errors, [
    {
      path: "modules.0.children.0.title",
      message: "Only one of name and title should be specified",
      code: "conflicting_fields",
      severity: "error",
    },
  ]);
});

test("assistant grading requires assistant viewing", () => {
  const result = validateCourse(
    courseDocument([moduleDocument("m1", [{ key: "ex1", category: "hw", allow_assistant_grading: true }])])
  );
  assert.deepEqual(
    result.errors?.map((issue) => [issue.path, issue.message]),
    [["modules.0.children.0.allow_assistant_grading", "Assistant grading is allowed but viewing is not"]]
  );
  assert.equal(
    validateCourse(
      courseDocument([
        moduleDocument("m1", [
          { key: "ex1", category: "hw", allow_assistant_grading: true, allow_assistant_viewing: true },
        ]),
      ])
    ).success,
    true
  );
});

test("static content paths must be relative", () => {
  const result = validateCourse(
    courseDocument([moduleDocument("m1", [{ key: "ch", category: "hw", static_content: { en: "/abs/page.rst" } }])])
  );
  assert.deepEqual(
    result.errors?.map((issue) => [issue.path, issue.message]),
    [["modules.0.children.0.static_content", "Path must be relative"]]
  );
});

test("unknown item fields are rejected", () => {
  const result = validateCourse(courseDocument([moduleDocument("m1", [{ key: "ex1", category: "hw", colour: "red" }])]));
  assert.deepEqual(
    result.errors?.map((issue) => [issue.path, issue.code]),
    [["modules.0.children.0", "unrecognized_keys"]]
  );
});

test("a course without a name is reported at the root", () => {
  const result = validateCourse({ modules: [] });
  assert.deepEqual(
    result.errors?.map((issue) => [issue.path, issue.message]),
    [["name", "Required"]]
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// TREE RULES
// ═══════════════════════════════════════════════════════════════════════════

section("Tree rules");

test("duplicate module keys are an error", () => {
  const result = validateCourse(courseDocument([moduleDocument("m1", []), moduleDocument("m1", [])]));
  assert.deepEqual(result.errors, [
    { path: "modules.1.key", message: "Duplicate module key: m1", code: "duplicate_module_key", severity: "error" },
  ]);
});

test("item keys are unique across modules", () => {
  const result = validateCourse(
    courseDocument([
      moduleDocument("m1", [{ key: "ex1", category: "hw" }]),
      moduleDocument("m2", [{ key: "ex1", category: "hw" }]),
    ])
  );
  assert.deepEqual(result.errors, [
    {
      path: "modules",
      message: "Duplicate learning object (chapter, exercise) keys: ex1",
      code: "duplicate_item_key",
      severity: "error",
    },
  ]);
});

test("an undeclared category is an error", () => {
  const result = validateCourse(
    courseDocument([moduleDocument("m1", [{ key: "ex1", category: "lab" }])], { categories: { hw: {} } })
  );
  assert.deepEqual(
    result.errors?.map((issue) => [issue.path, issue.message]),
    [["modules.0.children.0.category", "Category not found in categories: lab"]]
  );
});

test("categories are checked at any depth", () => {
  const result = validateCourse(
    courseDocument(
      [
        moduleDocument("m1", [
          { key: "ch", category: "hw", children: [{ key: "a", category: "hw", children: [{ key: "b", category: "exam" }] }] },
        ]),
      ],
      { categories: { hw: {} } }
    )
  );
  assert.deepEqual(
    result.errors?.map((issue) => issue.path),
    ["modules.0.children.0.children.0.children.0.category"]
  );
});

test("loadCourseOrThrow carries every issue", () => {
  try {
    loadCourseOrThrow(courseDocument([moduleDocument("m1", []), moduleDocument("m1", [])]), "index.yaml");
    assert.fail("expected a ConfigError");
  } catch (err) {
    assert.ok(err instanceof ConfigError);
    assert.equal(err.message, 'Invalid course configuration in "index.yaml" (1 issue(s))');
    assert.equal(err.issues[0]?.message, "Duplicate module key: m1");
  }
});

test("a valid course is frozen", () => {
  const course = valid(courseDocument([moduleDocument("m1", [])]));
  assert.equal(Object.isFrozen(course), true);
  assert.equal(Object.isFrozen(course.modules), true);
});

// ═══════════════════════════════════════════════════════════════════════════
// DATE WARNINGS
// ═══════════════════════════════════════════════════════════════════════════

section("Date warnings");

test("late or misplaced module dates are warnings", () => {
  const result = validateCourse(
    courseDocument(
      [
        moduleDocument("m1", [], { close: "2024-07-01" }),
        moduleDocument("m2", [], { close: "2024-05-15", late_close: "2024-05-01" }),
        moduleDocument("m3", [], { late_close: "2024-05-01" }),
        moduleDocument("m4", [], { close: "2024-05-15", late_close: "2024-05-20" }),
      ],
      { end: "2024-06-01" }
    )
  );
  assert.equal(result.success, true);
  assert.deepEqual(
    result.warnings?.map((issue) => [issue.path, issue.message, issue.severity]),
    [
      ["modules.0.close", "Course ends before module closes", "warning"],
      ["modules.1.late_close", "'late_close' is before 'close'", "warning"],
      ["modules.2.late_close", "'late_close' is before 'close'", "warning"],
    ]
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// WALKERS
// ═══════════════════════════════════════════════════════════════════════════

section("Tree walkers");

const walked = valid(
  courseDocument(
    [
      moduleDocument("m1", [
        { key: "ch1", category: "hw", static_content: "ch1.rst", children: [{ key: "ex1", category: "lab", config: "exercises/ex1" }] },
      ]),
      moduleDocument("m2", [
        { key: "ex2", category: "hw", type: "quiz" },
        { key: "ex3", category: "hw" },
        { key: "ex4", category: "hw", type: "unknown" },
      ]),
    ],
    { exercise_types: { quiz: { config: "types/quiz" } } }
  )
);

test("keys are collected depth-first in file order", () => {
  assert.deepEqual(collectItemKeys(walked), ["ch1", "ex1", "ex2", "ex3", "ex4"]);
});

test("categories are collected from every depth", () => {
  assert.deepEqual([...collectItemCategories(walked)].sort(), ["hw", "lab"]);
});

test("exercise configs come from config or the exercise type", () => {
  assert.deepEqual(flattenExerciseRefs(walked, { quiz: { config: "types/quiz" } }), {
    exercises: ["ex1", "ex2"],
    configFiles: { ex1: "exercises/ex1", ex2: "types/quiz" },
  });
});

test("without exercise types only direct configs count", () => {
  assert.deepEqual(flattenExerciseRefs(walked).exercises, ["ex1"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// POST-PROCESSING
// ═══════════════════════════════════════════════════════════════════════════

section("Post-processing");

const dir = mkdtempSync(join(tmpdir(), "course-config-course-"));
mkdirSync(join(dir, "exercises"), { recursive: true });
writeFileSync(join(dir, "exercises", "ex1.yaml"), "title: One\nview_type: forms\ncontainer:\n  mount: ex1\n");
writeFileSync(join(dir, "exercises", "ex2.yaml"), "title: Two\nview_type: forms\n");

const toProcess = valid(
  courseDocument([
    moduleDocument("m1", [
      { key: "ex1", category: "hw", config: "exercises/ex1" },
      { key: "ex2", category: "hw", config: "/exercises/ex2", configure: { url: "https://grader.test/custom" } },
      { key: "ch", category: "hw", static_content: "ch.rst" },
    ]),
  ])
);

test("exercise configs are loaded and configure is derived", () => {
  const result = postprocessCourse(toProcess, {
    courseDir: dir,
    graderConfigDir: dir,
    defaultLanguage: "en",
    defaultGraderUrl: "https://grader.test/",
  });
  assert.deepEqual([...result.exercises.keys()], ["ex1", "ex2"]);

  const items = result.course.modules[0]?.children ?? [];
  const first = child(items, 0);
  const second = child(items, 1);
  assert.deepEqual(first.kind === "exercise" ? first.configure : undefined, {
    url: "https://grader.test/",
    files: { ex1: "ex1" },
  });
  assert.deepEqual(second.kind === "exercise" ? second.configure : undefined, {
    url: "https://grader.test/custom",
    files: {},
  });
});

test("without a default grader configure is left unset", () => {
  const result = postprocessCourse(toProcess, { courseDir: dir, graderConfigDir: dir, defaultLanguage: "en" });
  const first = child(result.course.modules[0]?.children ?? [], 0);
  assert.equal(first.kind === "exercise" ? first.configure : "not an exercise", undefined);
});

test("the validated course is not modified", () => {
  const first = child(toProcess.modules[0]?.children ?? [], 0);
  assert.equal(first.kind === "exercise" ? first.configure : "not an exercise", undefined);
});

test("a missing exercise config is fatal", () => {
  const broken = valid(courseDocument([moduleDocument("m1", [{ key: "gone", category: "hw", config: "exercises/gone" }])]));
  assert.throws(
    () => postprocessCourse(broken, { courseDir: dir, graderConfigDir: dir, defaultLanguage: "en" }),
    { message: `No supported config at "${join(dir, "exercises", "gone")}"` }
  );
});

rmSync(dir, { recursive: true, force: true });

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
