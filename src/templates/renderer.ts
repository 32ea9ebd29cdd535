/**
 * Include template renderer.
 *
 * Processing order:
 *   1. Resolve conditional blocks (evaluate {{#if …}}…{{/if}})
 *   2. Substitute remaining {{variable}} placeholders
 *
 * Variables are dotted paths into the context mapping. A missing variable
 * renders as the empty string. Mappings and sequences render as JSON, which
 * is also valid YAML flow syntax. A string placeholder that forms a whole
 * value (`key: {{x}}`, `- {{x}}`) renders as a JSON string, so `: ` or `#`
 * in the value cannot change the document; placeholders inside other text
 * render the raw string.
 */

import { readFileSync, statSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";
import { ConfigError } from "../errors.js";
import { resolveConditionals } from "./conditional.js";
import { parseTemplate, PLACEHOLDER_RE, type ParsedTemplate } from "./template.js";

export type TemplateContext = Readonly<Record<string, unknown>>;

/**
 * Renders a named template with a context mapping.
 */
export interface TemplateRenderer {
  render(templateName: string, context: TemplateContext): string;
}

/**
 * Resolve a dotted variable path against the context.
 */
export function lookupVariable(context: TemplateContext, variable: string): unknown {
  let current: unknown = context;
  for (const part of variable.split(".")) {
    if (typeof current !== "object" || current === null || !Object.hasOwn(current, part)) {
      return undefined;
    }
    current = Reflect.get(current, part);
  }
  return current;
}

/**
 * True when source[start, end) is a whole mapping or sequence value on its line.
 */
export function isValuePosition(source: string, start: number, end: number): boolean {
  const lineStart = source.lastIndexOf("\n", start - 1) + 1;
  const lineEnd = source.indexOf("\n", end);
  const before = source.slice(lineStart, start);
  const after = source.slice(end, lineEnd === -1 ? source.length : lineEnd).trimStart();
  const opens = /:\s+$/.test(before) || /^\s*-\s+$/.test(before);
  const closes = after === "" || /^[,\]}#]/.test(after);
  return opens && closes;
}

function stringify(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  return JSON.stringify(value);
}

/**
 * Render a parsed template against a context.
 */
export function renderTemplate(template: ParsedTemplate, context: TemplateContext): string {
  const lookup = (variable: string): string | undefined => stringify(lookupVariable(context, variable));

  const resolvedSource =
    template.conditionals.length > 0 ? resolveConditionals(template.source, lookup) : template.source;

  return resolvedSource.replace(PLACEHOLDER_RE, (match: string, name: string, offset: number) => {
    const value = lookupVariable(context, name);
    if (typeof value === "string" && isValuePosition(resolvedSource, offset, offset + match.length)) {
      return JSON.stringify(value);
    }
    return stringify(value) ?? "";
  });
}

interface CachedTemplate {
  mtime: number;
  template: ParsedTemplate;
}

/**
 * Template renderer reading template files below a root directory.
 *
 * Parsed templates are cached per file and re-read when the file's
 * modification time changes.
 */
export class FileTemplateRenderer implements TemplateRenderer {
  private readonly root: string;
  private readonly cache = new Map<string, CachedTemplate>();

  constructor(root: string) {
    this.root = resolve(root);
  }

  /**
   * Absolute path of a template; names are relative to the root.
   */
  resolvePath(templateName: string): string {
    return isAbsolute(templateName) ? templateName : resolve(this.root, templateName);
  }

  load(templateName: string): ParsedTemplate {
    const filePath = this.resolvePath(templateName);
    let mtime: number;
    let source: string;
    try {
      mtime = statSync(filePath).mtimeMs;
      const cached = this.cache.get(filePath);
      if (cached !== undefined && cached.mtime === mtime) {
        return cached.template;
      }
      source = readFileSync(filePath, "utf-8");
    } catch (err) {
      throw new ConfigError(`Failed to load template "${templateName}"`, { cause: err });
    }

    const template = parseTemplate(source, templateName);
    this.cache.set(filePath, { mtime, template });
    return template;
  }

  render(templateName: string, context: TemplateContext): string {
    return renderTemplate(this.load(templateName), context);
  }
}
