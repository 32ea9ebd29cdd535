/**
 * Include template parsing.
 *
 * An include file rendered with a `template_context` is plain text (usually
 * YAML) containing `{{variable.path}}` placeholders and optional
 * `{{#if …}}…{{/if}}` conditional blocks.
 *
 * TEMPLATE FORMAT:
 *
 *   VARIABLE SUBSTITUTION:
 *     {{points}}                   top-level context value
 *     {{grader.image}}             nested path into the context mapping
 *
 *   CONDITIONAL BLOCKS:
 *     {{#if feedback}}
 *     feedback_template: {{feedback}}
 *     {{/if}}
 *
 *     {{#if mode == "strict"}}
 *     max_submissions: 1
 *     {{/if}}
 *
 * Rules:
 *   - Placeholders use double-brace syntax: {{ and }}
 *   - Variable names are dotted alphanumeric paths
 *   - Whitespace inside braces is trimmed: {{ points }} is valid
 *   - No nested conditionals
 */

import { parseConditionalBlocks, type ConditionalBlock } from "./conditional.js";

/**
 * Matches `{{variable.name}}` with optional inner whitespace.
 * Captures the trimmed variable name in group 1.
 */
export const PLACEHOLDER_RE = /\{\{\s*([a-zA-Z_][a-zA-Z0-9_.]*)\s*\}\}/g;

/**
 * A parsed include template.
 */
export interface ParsedTemplate {
  /** The raw template source string (with placeholders intact). */
  source: string;
  /** Parsed conditional blocks ({{#if …}}…{{/if}}). */
  conditionals: ConditionalBlock[];
  /** Optional name/id for error messages. */
  name?: string;
}

/**
 * Parse a template string and its conditional blocks.
 *
 * @throws ConfigError if conditional blocks are malformed
 */
export function parseTemplate(source: string, name?: string): ParsedTemplate {
  const conditionals = parseConditionalBlocks(source, name ?? "(anonymous)");
  return {
    source,
    conditionals,
    name,
  };
}
