/**
 * Include template rendering.
 *
 * Usage:
 *   const templates = new FileTemplateRenderer(coursesPath);
 *   const yaml = templates.render("demo/templates/grader.yaml", { points: 10 });
 */

export { parseTemplate, type ParsedTemplate } from "./template.js";
export {
  parseConditionalBlocks,
  evaluateCondition,
  resolveConditionals,
  type ConditionalBlock,
  type ConditionalOperator,
} from "./conditional.js";
export {
  renderTemplate,
  lookupVariable,
  isValuePosition,
  FileTemplateRenderer,
  type TemplateRenderer,
  type TemplateContext,
} from "./renderer.js";
