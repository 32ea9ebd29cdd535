/**
 * Course registry.
 *
 * The registry is the authoritative list of course keys. The cache asks it
 * which courses exist and where their directories are; it never writes to it.
 */

import { readdirSync, type Dirent } from "node:fs";
import { join } from "node:path";
import { z } from "zod";
import { ConfigError } from "../errors.js";

// ---------------------------------------------------------------------------
// Records
// ---------------------------------------------------------------------------

export const CourseRecordSchema = z.object({
  key: z.string().regex(/^[-a-zA-Z0-9_]+$/, "Course keys may only contain letters, digits, '-' and '_'"),
  /** Course instance id in the learning environment */
  remoteId: z.number().int().nullable().default(null),
  gitOrigin: z.string().default(""),
  gitBranch: z.string().max(40).default("master"),
  updateHook: z.union([z.string().url(), z.literal("")]).default(""),
  emailOnError: z.boolean().default(true),
  updateAutomatically: z.boolean().default(true),
});

export type CourseRecord = z.infer<typeof CourseRecordSchema>;

// ---------------------------------------------------------------------------
// Registry implementations
// ---------------------------------------------------------------------------

export interface CourseRegistry {
  /** Every known course key, sorted */
  keys(): string[];
  /** Course directory */
  pathTo(key: string): string;
  find(key: string): CourseRecord | undefined;
}

/**
 * Registry backed by a fixed list of course records.
 */
export class StaticCourseRegistry implements CourseRegistry {
  private readonly records: Map<string, CourseRecord>;

  /**
   * @throws ConfigError when a record is invalid or a key repeats
   */
  constructor(
    private readonly coursesPath: string,
    records: readonly unknown[]
  ) {
    const result = z.array(CourseRecordSchema).safeParse(records);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
        .join("; ");
      throw new ConfigError(`Invalid course registry: ${details}`);
    }

    this.records = new Map();
    for (const record of result.data) {
      if (this.records.has(record.key)) {
        throw new ConfigError(`Duplicate course key in registry: ${record.key}`);
      }
      this.records.set(record.key, record);
    }
  }

  keys(): string[] {
    return [...this.records.keys()].sort();
  }

  pathTo(key: string): string {
    return join(this.coursesPath, key);
  }

  find(key: string): CourseRecord | undefined {
    return this.records.get(key);
  }
}

/**
 * Registry that treats every subdirectory of the courses path as a course.
 */
export class DirectoryCourseRegistry implements CourseRegistry {
  constructor(private readonly coursesPath: string) {}

  keys(): string[] {
    let entries: Dirent[];
    try {
      entries = readdirSync(this.coursesPath, { withFileTypes: true });
    } catch (err) {
      throw new ConfigError(`Cannot list courses in "${this.coursesPath}"`, { cause: err });
    }
    return entries
      .filter((entry) => entry.isDirectory() && !entry.name.startsWith("."))
      .map((entry) => entry.name)
      .filter((name) => CourseRecordSchema.shape.key.safeParse(name).success)
      .sort();
  }

  pathTo(key: string): string {
    return join(this.coursesPath, key);
  }

  find(key: string): CourseRecord | undefined {
    if (!this.keys().includes(key)) {
      return undefined;
    }
    return CourseRecordSchema.parse({ key });
  }
}
