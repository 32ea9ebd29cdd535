/**
 * Generic walkers over the course tree.
 */

import { isConfigMapping, type ConfigValue } from "../types/index.js";
import { isGradedItem, type Course, type Item, type Module } from "./schema.js";

export interface ItemVisit {
  item: Item;
  /** Module the item belongs to */
  module: Module;
  /** Dotted path from the course root, e.g. "modules.0.children.2" */
  path: string;
  /** 1 for direct children of a module */
  depth: number;
}

/**
 * Visit every item depth-first, parents before their children, in file order.
 */
export function walkItems(course: Pick<Course, "modules">, visit: (visit: ItemVisit) => void): void {
  const descend = (items: readonly Item[], module: Module, path: string, depth: number): void => {
    items.forEach((item, index) => {
      const itemPath = `${path}.children.${index}`;
      visit({ item, module, path: itemPath, depth });
      descend(item.children, module, itemPath, depth + 1);
    });
  };

  course.modules.forEach((module, index) => {
    descend(module.children, module, `modules.${index}`, 1);
  });
}

/**
 * All item keys in walk order. Duplicates are kept.
 */
export function collectItemKeys(course: Pick<Course, "modules">): string[] {
  const keys: string[] = [];
  walkItems(course, ({ item }) => keys.push(item.key));
  return keys;
}

/**
 * Every category referenced by an item at any depth.
 */
export function collectItemCategories(course: Pick<Course, "modules">): Set<string> {
  const categories = new Set<string>();
  walkItems(course, ({ item }) => categories.add(item.category));
  return categories;
}

/**
 * Rebuild the tree with `transform` applied to every item.
 * Children are transformed before their parent sees them.
 */
export function mapItems<C extends Pick<Course, "modules">>(course: C, transform: (item: Item) => Item): C {
  const mapChildren = (items: readonly Item[]): Item[] =>
    items.map((item) => transform({ ...item, children: mapChildren(item.children) }));

  return {
    ...course,
    modules: course.modules.map((module) => ({ ...module, children: mapChildren(module.children) })),
  };
}

export interface ExerciseRefs {
  /** Exercise keys in walk order */
  exercises: string[];
  /** Exercise key → config file path as written in the course */
  configFiles: Record<string, string>;
}

function inheritedConfig(type: string | undefined, exerciseTypes: ConfigValue | undefined): string | undefined {
  if (type === undefined || !isConfigMapping(exerciseTypes)) {
    return undefined;
  }
  const declared = exerciseTypes[type];
  if (!isConfigMapping(declared)) {
    return undefined;
  }
  const config = declared["config"];
  return typeof config === "string" && config.length > 0 ? config : undefined;
}

/**
 * Collect every exercise that has a config file.
 *
 * An exercise names its config directly with `config`, or inherits it from
 * the `exercise_types` entry matching its `type`. Items with neither are
 * skipped.
 */
export function flattenExerciseRefs(
  course: Pick<Course, "modules">,
  exerciseTypes?: ConfigValue
): ExerciseRefs {
  const refs: ExerciseRefs = { exercises: [], configFiles: {} };
  walkItems(course, ({ item }) => {
    if (!isGradedItem(item)) {
      return;
    }
    const config = item.config ?? inheritedConfig(item.type, exerciseTypes);
    if (config !== undefined) {
      refs.exercises.push(item.key);
      refs.configFiles[item.key] = config;
    }
  });
  return refs;
}
