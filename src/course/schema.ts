/**
 * Course tree schema and type definitions.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * TREE SHAPE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   Course
 *     └─ Module[]                 (keys unique among modules)
 *          └─ Item[]              (keys unique across the whole course)
 *               └─ Item[] …       (any depth)
 *
 * An Item is one of four variants sharing the base item fields:
 *
 *   chapter                static content page (`static_content`)
 *   exercise               graded exercise, optionally with a `config` file
 *   lti_exercise           exercise served by an LTI tool (`lti`)
 *   exercise_collection    points collected from another category
 *
 * Files do not name the variant; classifyItem() infers it from the fields
 * that only one variant has.
 *
 * The schemas below describe a single node. Children are validated one node
 * at a time by the validator, so every schema takes `children` as an opaque
 * list.
 * ═══════════════════════════════════════════════════════════════════════════
 */

import { isAbsolute } from "node:path";
import { z } from "zod";

// ---------------------------------------------------------------------------
// Field types
// ---------------------------------------------------------------------------

/**
 * A value that is either language-independent or given per language.
 *
 *   name: "Week 1"
 *   name: { en: "Week 1", fi: "Viikko 1" }
 */
export function localized<T extends z.ZodTypeAny>(schema: T) {
  return z.union([schema, z.record(z.string(), schema)]);
}

export type Localized<T> = T | Record<string, T>;

export const LocalizedString = localized(z.string());

/** Keys may be written as numbers in YAML; they are always strings here. */
export const ItemKey = z
  .union([z.string().min(1), z.number()])
  .transform((value) => String(value));

const DATE_RE =
  /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[T ](\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,6}))?)?\s*(Z|[+-]\d{2}:?\d{2})?)?$/;

function pad(value: string | undefined, width = 2): string {
  return (value ?? "0").padStart(width, "0");
}

/**
 * Parse a course date.
 *
 * Accepts `YYYY-MM-DD`, `YYYY-MM-DD HH:MM[:SS[.ffffff]]` with an optional
 * `Z` or `±HH:MM` offset (`T` may replace the space), or epoch seconds.
 * Times without an offset are read as UTC.
 */
export function parseCourseDate(value: string | number | Date): Date | undefined {
  if (value instanceof Date) {
    return isNaN(value.getTime()) ? undefined : value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? new Date(value * 1000) : undefined;
  }

  const match = DATE_RE.exec(value.trim());
  if (match === null) {
    return undefined;
  }
  const [, year, month, day, hour, minute, second, fraction, zone] = match;
  const millis = (fraction ?? "0").padEnd(3, "0").slice(0, 3);
  let offset = zone ?? "Z";
  if (offset !== "Z" && !offset.includes(":")) {
    offset = `${offset.slice(0, 3)}:${offset.slice(3)}`;
  }
  const iso = `${year}-${pad(month)}-${pad(day)}T${pad(hour)}:${pad(minute)}:${pad(second)}.${millis}${offset}`;
  const date = new Date(iso);
  if (isNaN(date.getTime()) || (offset === "Z" && date.getUTCDate() !== Number(day))) {
    return undefined;
  }
  return date;
}

export const CourseDate = z.union([z.string(), z.number(), z.date()]).transform((value, ctx) => {
  const date = parseCourseDate(value);
  if (date === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid date "${String(value)}" (expected YYYY-MM-DD[ HH:MM[:SS]][Z|±HH:MM])`,
    });
    return z.NEVER;
  }
  return date;
});

/**
 * Duration as seconds or `<integer><unit>`, unit one of y, m, w, d, h.
 */
export const Duration = z.union([
  z.number().nonnegative(),
  z
    .string()
    .min(1, "An empty string cannot be turned into a duration")
    .regex(/^[+-]?\d+[ymwdh]$/, "Format: <integer>(y|m|d|h|w) e.g. 3d"),
]);

const NonNegativeInt = z.number().int().nonnegative();

/** Children are validated node by node; here they are an opaque list. */
const ChildList = z.array(z.unknown()).default([]);

// ---------------------------------------------------------------------------
// Items
// ---------------------------------------------------------------------------

/**
 * Fields shared by every learning object.
 */
const ItemFields = {
  key: ItemKey,
  category: z.string().min(1),
  status: z.string().optional(),
  order: z.number().int().optional(),
  audience: z.string().optional(),
  name: LocalizedString.optional(),
  description: z.string().optional(),
  use_wide_column: z.boolean().optional(),
  url: LocalizedString.optional(),
  model_answer: LocalizedString.optional(),
  exercise_template: LocalizedString.optional(),
  exercise_info: z.unknown().optional(),
  children: ChildList,
};

/**
 * Grader configuration of an exercise.
 */
export const ConfigureOptionsSchema = z
  .object({
    url: z.string().min(1),
    files: z.record(z.string(), z.string()).default({}),
  })
  .strict();
export type ConfigureOptions = z.infer<typeof ConfigureOptionsSchema>;

const ExerciseFields = {
  ...ItemFields,
  max_submissions: NonNegativeInt.default(0),
  configure: ConfigureOptionsSchema.optional(),
  allow_assistant_viewing: z.boolean().optional(),
  allow_assistant_grading: z.boolean().optional(),
  config: z.string().min(1).optional(),
  type: z.string().optional(),
  confirm_the_level: z.boolean().optional(),
  difficulty: z.string().optional(),
  min_group_size: NonNegativeInt.optional(),
  max_group_size: NonNegativeInt.optional(),
  max_points: NonNegativeInt.optional(),
  points_to_pass: NonNegativeInt.optional(),
};

/**
 * Assistants may only grade what they are allowed to see.
 */
function assistantPermissions(
  value: { allow_assistant_viewing?: boolean; allow_assistant_grading?: boolean },
  ctx: z.RefinementCtx
): void {
  if (value.allow_assistant_grading === true && value.allow_assistant_viewing !== true) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["allow_assistant_grading"],
      message: "Assistant grading is allowed but viewing is not",
    });
  }
}

export const ExerciseSchema = z.object(ExerciseFields).strict().superRefine(assistantPermissions);

export const LtiExerciseSchema = z
  .object({
    ...ExerciseFields,
    lti: z.string().min(1),
    lti_context_id: z.string().optional(),
    lti_resource_link_id: z.string().optional(),
    lti_aplus_get_and_post: z.boolean().optional(),
    lti_open_in_iframe: z.boolean().optional(),
  })
  .strict()
  .superRefine(assistantPermissions);

export const ExerciseCollectionSchema = z
  .object({
    ...ItemFields,
    target_category: z.string().min(1),
    target_url: z.string().min(1),
    max_points: z.number().int().positive(),
    points_to_pass: NonNegativeInt.optional(),
  })
  .strict();

export const ChapterSchema = z
  .object({
    ...ItemFields,
    static_content: localized(z.string().min(1)),
    generate_table_of_contents: z.boolean().optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    const paths = typeof value.static_content === "string" ? [value.static_content] : Object.values(value.static_content);
    if (paths.some((path) => isAbsolute(path))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["static_content"],
        message: "Path must be relative",
      });
    }
  });

export type ItemKind = "chapter" | "exercise" | "lti_exercise" | "exercise_collection";

export const ITEM_SCHEMAS = {
  chapter: ChapterSchema,
  exercise: ExerciseSchema,
  lti_exercise: LtiExerciseSchema,
  exercise_collection: ExerciseCollectionSchema,
} as const;

type ItemBase<T> = Omit<T, "children">;
type ChapterBase = ItemBase<z.infer<typeof ChapterSchema>>;
type ExerciseBase = ItemBase<z.infer<typeof ExerciseSchema>>;
type LtiExerciseBase = ItemBase<z.infer<typeof LtiExerciseSchema>>;
type ExerciseCollectionBase = ItemBase<z.infer<typeof ExerciseCollectionSchema>>;

export interface ChapterItem extends ChapterBase { kind: "chapter"; children: Item[] }
export interface ExerciseItem extends ExerciseBase { kind: "exercise"; children: Item[] }
export interface LtiExerciseItem extends LtiExerciseBase { kind: "lti_exercise"; children: Item[] }
export interface ExerciseCollectionItem extends ExerciseCollectionBase { kind: "exercise_collection"; children: Item[] }

export type Item = ChapterItem | ExerciseItem | LtiExerciseItem | ExerciseCollectionItem;

/** Items that are graded exercises and may reference a config file. */
export type GradedItem = ExerciseItem | LtiExerciseItem;

export function isGradedItem(item: Item): item is GradedItem {
  return item.kind === "exercise" || item.kind === "lti_exercise";
}

/**
 * Infer the variant of a raw item from its distinguishing fields.
 */
export function classifyItem(raw: Readonly<Record<string, unknown>>): ItemKind {
  if ("static_content" in raw) {
    return "chapter";
  }
  if ("lti" in raw) {
    return "lti_exercise";
  }
  if ("target_category" in raw || "target_url" in raw) {
    return "exercise_collection";
  }
  return "exercise";
}

// ---------------------------------------------------------------------------
// Modules
// ---------------------------------------------------------------------------

export const ModuleSchema = z.object({
  key: ItemKey,
  name: LocalizedString,
  status: z.string().default("ready"),
  order: z.number().int().optional(),
  introduction: z.string().optional(),
  open: CourseDate.optional(),
  close: CourseDate.optional(),
  duration: Duration.optional(),
  read_open: CourseDate.nullable().optional(),
  points_to_pass: NonNegativeInt.optional(),
  late_close: CourseDate.optional(),
  late_penalty: z.number().min(0).max(1).optional(),
  late_duration: Duration.optional(),
  numerate_ignoring_modules: z.boolean().optional(),
  children: ChildList,
});

export type Module = Omit<z.infer<typeof ModuleSchema>, "children"> & { children: Item[] };

// ---------------------------------------------------------------------------
// Course
// ---------------------------------------------------------------------------

export const CourseSchema = z.object({
  name: z.string().min(1),
  modules: z.array(z.unknown()),
  lang: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]).default("en"),
  categories: z.record(z.string(), z.unknown()).default({}),
  archive_time: CourseDate.optional(),
  assistants: z.array(z.string()).optional(),
  contact: z.string().optional(),
  content_numbering: z.string().optional(),
  course_description: z.string().optional(),
  course_footer: z.string().optional(),
  description: z.string().optional(),
  start: CourseDate.optional(),
  end: CourseDate.optional(),
  enrollment_audience: z.string().optional(),
  enrollment_end: CourseDate.optional(),
  enrollment_start: CourseDate.optional(),
  head_urls: z.array(z.string().url()).default([]),
  index_mode: z.string().optional(),
  lifesupport_time: CourseDate.optional(),
  module_numbering: z.string().optional(),
  numerate_ignoring_modules: z.boolean().optional(),
  view_content_to: z.string().optional(),
  static_dir: z.string().optional(),
});

export type Course = Omit<z.infer<typeof CourseSchema>, "modules"> & { modules: Module[] };
