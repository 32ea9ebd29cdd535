/**
 * Conditional block parsing and evaluation.
 *
 * Supported syntax:
 *
 *   {{#if variable}}…{{/if}}               non-empty value
 *   {{#if variable == "value"}}…{{/if}}    exact string match
 *   {{#if variable != "value"}}…{{/if}}    anything else, including unset
 *
 * No nesting and no `{{#else}}`: use a second block with `!=`.
 */

import { ConfigError } from "../errors.js";

export type ConditionalOperator = "==" | "!=" | "truthy";

/**
 * A parsed conditional block from a template.
 */
export interface ConditionalBlock {
  /** The context variable being tested. */
  variable: string;
  operator: ConditionalOperator;
  /** The literal value for == / != comparisons (undefined for truthy). */
  value?: string;
  /** The body text inside the block (may contain {{var}} placeholders). */
  body: string;
  /** The full raw text of the block including opening/closing tags. */
  raw: string;
}

/**
 * Groups:
 *   1: variable name
 *   2: operator (== or !=), optional
 *   3: comparison value (inside quotes), optional
 *   4: body content
 */
const CONDITIONAL_RE =
  /\{\{#if\s+([a-zA-Z_][a-zA-Z0-9_.]*)\s*(?:(==|!=)\s*"([^"]*)")?\s*\}\}([\s\S]*?)\{\{\/if\}\}/g;

const NESTED_IF_RE = /\{\{#if\s/;

function toOperator(operator: string | undefined): ConditionalOperator {
  return operator === "==" || operator === "!=" ? operator : "truthy";
}

/**
 * Extract all conditional blocks from a template source string.
 *
 * @throws ConfigError for nested or unbalanced blocks
 */
export function parseConditionalBlocks(source: string, templateName: string): ConditionalBlock[] {
  const blocks: ConditionalBlock[] = [];
  const issues: string[] = [];

  for (const match of source.matchAll(CONDITIONAL_RE)) {
    const [raw, variable = "", operator, value, body = ""] = match;

    if (NESTED_IF_RE.test(body)) {
      issues.push(`Nested conditionals are not supported (found {{#if inside {{#if ${variable}…}})`);
      continue;
    }

    const op = toOperator(operator);
    blocks.push({
      variable,
      operator: op,
      value: op !== "truthy" ? value : undefined,
      body,
      raw,
    });
  }

  const openTags = source.match(/\{\{#if\s/g) ?? [];
  const closeTags = source.match(/\{\{\/if\}\}/g) ?? [];
  if (openTags.length !== closeTags.length) {
    issues.push(
      `Mismatched conditional tags: ${openTags.length} opening {{#if}}, ${closeTags.length} closing {{/if}}`
    );
  }

  if (issues.length > 0) {
    throw new ConfigError(
      `Template "${templateName}" has invalid conditional(s):\n  - ${issues.join("\n  - ")}`
    );
  }

  return blocks;
}

/**
 * Evaluate a single conditional block against a context value.
 * `undefined` means the variable is not in the context.
 */
export function evaluateCondition(block: ConditionalBlock, contextValue: string | undefined): boolean {
  switch (block.operator) {
    case "truthy":
      return contextValue !== undefined && contextValue !== "";
    case "==":
      return contextValue !== undefined && contextValue === block.value;
    case "!=":
      return contextValue === undefined || contextValue !== block.value;
  }
}

/**
 * Replace every conditional block with its body or with nothing.
 *
 * @param lookup - Resolves a variable name to its string value
 */
export function resolveConditionals(
  source: string,
  lookup: (variable: string) => string | undefined
): string {
  return source.replace(
    CONDITIONAL_RE,
    (raw: string, variable: string, operator: string | undefined, value: string | undefined, body: string) => {
      const op = toOperator(operator);
      const block: ConditionalBlock = {
        variable,
        operator: op,
        value: op !== "truthy" ? value : undefined,
        body,
        raw,
      };
      return evaluateCondition(block, lookup(variable)) ? body : "";
    }
  );
}
