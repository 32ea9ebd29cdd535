/**
 * Processor tags and language variants.
 *
 * A mapping key may carry processor tags: `title|i18n`, `intro|rst`,
 * `body|rst|i18n`. Tags apply right to left and the result is stored under
 * the bare name. Processing a document yields one fully resolved copy per
 * language seen in any `i18n` value.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * TWO PHASES
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   1. compileTags() walks the raw document once. Every mapping entry becomes
 *      a (name, tags, value) triple, ordered by raw key (shorter keys first,
 *      then lexicographic). Unknown tags are rejected here.
 *
 *   2. expandTags() walks the compiled tree for one target language and
 *      applies each entry's tags before descending into the value.
 *
 *   processTags() runs phase 2 for the default language while collecting the
 *   language codes of every `i18n` value it reaches, then once more for each
 *   collected language.
 *
 * Example:
 *
 *   { "title|i18n": { en: "Hello", fi: "Hei" }, view_type: "x" }
 *
 *   processTags(doc, "en") →
 *     {
 *       en: { title: "Hello", view_type: "x" },
 *       fi: { title: "Hei", view_type: "x" },
 *     }
 */

import { ConfigError } from "../errors.js";
import { silentLogger, type Logger } from "../logging/index.js";
import type { ConfigMapping, ConfigScalar, ConfigValue } from "../types/index.js";

// ---------------------------------------------------------------------------
// Tags
// ---------------------------------------------------------------------------

/** Matches a trailing `|tag` suffix; group 1 is the rest of the key. */
const PROCESSOR_TAG_RE = /^(.+)\|(\w+)$/;

export const PROCESSOR_TAGS = ["i18n", "rst"] as const;
export type ProcessorTag = (typeof PROCESSOR_TAGS)[number];

function isProcessorTag(value: string): value is ProcessorTag {
  return (PROCESSOR_TAGS as readonly string[]).includes(value);
}

/**
 * Renders markup text (reStructuredText) to an HTML string.
 */
export interface MarkupRenderer {
  render(markup: string): string;
}

/** Language code to resolved document. The default language is always present. */
export type LanguageVariantSet = Readonly<Record<string, ConfigMapping>>;

export interface TagOptions {
  /** Renderer for `rst` tags; `rst` without one is an error */
  markup?: MarkupRenderer;
  logger?: Logger;
}

// ---------------------------------------------------------------------------
// Compiled tree
// ---------------------------------------------------------------------------

export interface CompiledEntry {
  /** Key as written in the file */
  rawKey: string;
  /** Key with every tag stripped */
  name: string;
  /** Tags in application order (rightmost first) */
  tags: ProcessorTag[];
  value: CompiledNode;
}

export interface CompiledMapping {
  kind: "mapping";
  entries: CompiledEntry[];
}

export type CompiledNode =
  | CompiledMapping
  | { kind: "sequence"; items: CompiledNode[] }
  | { kind: "scalar"; value: ConfigScalar };

/**
 * Split a raw key into its bare name and tags (rightmost tag first).
 *
 * @example parseTaggedKey("body|rst|i18n") → { name: "body", tags: ["i18n", "rst"] }
 */
export function parseTaggedKey(rawKey: string): { name: string; tags: string[] } {
  const tags: string[] = [];
  let name = rawKey;
  let match = PROCESSOR_TAG_RE.exec(name);
  while (match !== null) {
    name = match[1] ?? name;
    tags.push(match[2] ?? "");
    match = PROCESSOR_TAG_RE.exec(name);
  }
  return { name, tags };
}

/** Shorter keys first, then code-unit order. */
function compareKeys(a: string, b: string): number {
  if (a.length !== b.length) {
    return a.length - b.length;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

function compileNode(value: ConfigValue, path: string): CompiledNode {
  if (Array.isArray(value)) {
    return { kind: "sequence", items: value.map((item, i) => compileNode(item, `${path}.${i}`)) };
  }
  if (value !== null && typeof value === "object") {
    return compileTags(value, path);
  }
  return { kind: "scalar", value };
}

/**
 * Phase 1: compile a raw mapping into ordered (name, tags, value) triples.
 *
 * @throws ConfigError for an unsupported tag
 */
export function compileTags(document: ConfigMapping, path = "(root)"): CompiledMapping {
  const entries: CompiledEntry[] = [];
  for (const rawKey of Object.keys(document).sort(compareKeys)) {
    const { name, tags } = parseTaggedKey(rawKey);
    const checked: ProcessorTag[] = [];
    for (const tag of tags) {
      if (!isProcessorTag(tag)) {
        throw new ConfigError(`Unsupported processor tag "${tag}" in key "${rawKey}" at ${path}`);
      }
      checked.push(tag);
    }
    const childPath = path === "(root)" ? rawKey : `${path}.${rawKey}`;
    const value = document[rawKey] ?? null;
    entries.push({ rawKey, name, tags: checked, value: compileNode(value, childPath) });
  }
  return { kind: "mapping", entries };
}

// ---------------------------------------------------------------------------
// Expansion
// ---------------------------------------------------------------------------

interface ExpandState {
  language: string;
  markup?: MarkupRenderer;
  /** Language codes seen in i18n values; set only on the default pass */
  languages?: Set<string>;
  applied: number;
}

type TagHandler = (value: CompiledNode, key: string, state: ExpandState) => CompiledNode;

const NULL_NODE: CompiledNode = { kind: "scalar", value: null };

const TAG_HANDLERS: Record<ProcessorTag, TagHandler> = {
  i18n: (value, key, state) => {
    if (value.kind !== "mapping") {
      throw new ConfigError(`Value of "${key}" must be a mapping of language codes`);
    }
    const selected = value.entries.find((entry) => entry.rawKey === state.language);
    return selected?.value ?? NULL_NODE;
  },
  rst: (value, key, state) => {
    if (value.kind !== "scalar" || typeof value.value !== "string") {
      throw new ConfigError(`Value of "${key}" must be markup text`);
    }
    if (state.markup === undefined) {
      throw new ConfigError(`Cannot render "${key}": no markup renderer configured`);
    }
    return { kind: "scalar", value: state.markup.render(value.value) };
  },
};

function expandNode(node: CompiledNode, state: ExpandState): ConfigValue {
  switch (node.kind) {
    case "scalar":
      return node.value;
    case "sequence":
      return node.items.map((item) => expandNode(item, state));
    case "mapping":
      return expandMapping(node, state);
  }
}

function expandMapping(node: CompiledMapping, state: ExpandState): ConfigMapping {
  const result: ConfigMapping = {};
  for (const entry of node.entries) {
    let value = entry.value;
    for (const tag of entry.tags) {
      if (tag === "i18n" && state.languages !== undefined && value.kind === "mapping") {
        for (const languageEntry of value.entries) {
          state.languages.add(languageEntry.rawKey);
        }
      }
      value = TAG_HANDLERS[tag](value, entry.rawKey, state);
      state.applied++;
    }
    result[entry.name] = expandNode(value, state);
  }
  return result;
}

/**
 * Phase 2: resolve a compiled document for one language.
 *
 * @param collect - Receives the language codes of every i18n value reached
 */
export function expandTags(
  compiled: CompiledMapping,
  language: string,
  options: TagOptions = {},
  collect?: Set<string>
): ConfigMapping {
  return expandMapping(compiled, { language, markup: options.markup, languages: collect, applied: 0 });
}

/**
 * Process tags and create one document version per language.
 *
 * @param document        - Raw document (not modified)
 * @param defaultLanguage - Language of the first pass; always in the result
 * @returns Language code → resolved document, default language first
 * @throws ConfigError for unsupported tags or malformed tagged values
 */
export function processTags(
  document: ConfigMapping,
  defaultLanguage: string,
  options: TagOptions = {}
): LanguageVariantSet {
  const logger = options.logger ?? silentLogger;
  const compiled = compileTags(document);

  const languages = new Set<string>();
  const defaultState: ExpandState = {
    language: defaultLanguage,
    markup: options.markup,
    languages,
    applied: 0,
  };
  const variants: Record<string, ConfigMapping> = {
    [defaultLanguage]: expandMapping(compiled, defaultState),
  };
  let applied = defaultState.applied;

  languages.delete(defaultLanguage);
  for (const language of [...languages].sort()) {
    const state: ExpandState = { language, markup: options.markup, applied: 0 };
    variants[language] = expandMapping(compiled, state);
    applied += state.applied;
  }

  logger.debug(`Processed ${applied} tags.`, { languages: Object.keys(variants) });
  return variants;
}
