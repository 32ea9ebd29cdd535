/**
 * Tests for include template parsing and rendering.
 *
 * Run: node --import tsx src/templates/templates.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, utimesSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  evaluateCondition,
  FileTemplateRenderer,
  isValuePosition,
  lookupVariable,
  parseConditionalBlocks,
  parseTemplate,
  renderTemplate,
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

// ═══════════════════════════════════════════════════════════════════════════
// PARSING
// ═══════════════════════════════════════════════════════════════════════════

section("Parsing");

test("a parsed template holds its source and conditionals", () => {
  assert.deepEqual(parseTemplate("v: {{x}}", "t.yaml"), { source: "v: {{x}}", conditionals: [], name: "t.yaml" });
});

test("conditional blocks are parsed with their operator", () => {
  const blocks = parseConditionalBlocks('{{#if mode == "strict"}}x{{/if}}{{#if flag}}y{{/if}}', "t");
  assert.deepEqual(
    blocks.map((block) => [block.variable, block.operator, block.value, block.body]),
    [
      ["mode", "==", "strict", "x"],
      ["flag", "truthy", undefined, "y"],
    ]
  );
});

test("unbalanced blocks are rejected", () => {
  assert.throws(() => parseTemplate("{{#if a}}x", "broken.yaml"), {
    name: "ConfigError",
    message:
      'Template "broken.yaml" has invalid conditional(s):\n' +
      "  - Mismatched conditional tags: 1 opening {{#if}}, 0 closing {{/if}}",
  });
});

test("!= holds for unset variables", () => {
  const [block] = parseConditionalBlocks('{{#if mode != "x"}}y{{/if}}', "t");
  assert.ok(block !== undefined);
  assert.equal(evaluateCondition(block, undefined), true);
  assert.equal(evaluateCondition(block, "x"), false);
});

// ═══════════════════════════════════════════════════════════════════════════
// RENDERING
// ═══════════════════════════════════════════════════════════════════════════

section("Rendering");

test("dotted paths reach into nested context", () => {
  assert.equal(lookupVariable({ grader: { image: "grader:1" } }, "grader.image"), "grader:1");
  assert.equal(lookupVariable({ grader: {} }, "grader.image"), undefined);
});

test("missing variables render as empty strings", () => {
  assert.equal(renderTemplate(parseTemplate("a: {{missing}}!"), {}), "a: !");
});

test("mappings render as JSON", () => {
  assert.equal(renderTemplate(parseTemplate("files: {{files}}"), { files: { a: "b" } }), 'files: {"a":"b"}');
});

test("conditionals are resolved before substitution", () => {
  const template = parseTemplate('{{#if mode == "strict"}}max: {{max}}\n{{/if}}title: {{title}}');
  assert.equal(renderTemplate(template, { mode: "strict", max: 1, title: "T" }), 'max: 1\ntitle: "T"');
  assert.equal(renderTemplate(template, { mode: "lax", max: 1, title: "T" }), 'title: "T"');
});

test("whole string values render as JSON strings", () => {
  const rendered = renderTemplate(parseTemplate("title: {{title}}\nitems:\n  - {{item}} # first\n"), {
    title: "Part 1: intro #1",
    item: 'say "hi"',
  });
  assert.equal(rendered, 'title: "Part 1: intro #1"\nitems:\n  - "say \\"hi\\"" # first\n');
});

test("strings inside other text are substituted raw", () => {
  assert.equal(
    renderTemplate(parseTemplate("url: https://{{host}}/x\nname: Lab {{n}}"), { host: "grader.test", n: "2" }),
    "url: https://grader.test/x\nname: Lab 2"
  );
});

test("value positions follow a key or a list dash", () => {
  const at = (source: string) => isValuePosition(source, source.indexOf("{{"), source.indexOf("}}") + 2);
  assert.equal(at("a: {{x}}"), true);
  assert.equal(at('"a": {{x}},'), true);
  assert.equal(at("  - {{x}}"), true);
  assert.equal(at("a: b{{x}}"), false);
  assert.equal(at("a: {{x}} c"), false);
  assert.equal(at("{{x}}"), false);
});

test("file templates are re-read when their mtime changes", () => {
  const dir = mkdtempSync(join(tmpdir(), "course-config-templates-"));
  try {
    const file = join(dir, "t.yaml");
    writeFileSync(file, "v: {{x}}");
    utimesSync(file, 1000, 1000);
    const renderer = new FileTemplateRenderer(dir);
    assert.equal(renderer.render("t.yaml", { x: 1 }), "v: 1");

    writeFileSync(file, "w: {{x}}");
    utimesSync(file, 2000, 2000);
    assert.equal(renderer.render("t.yaml", { x: 1 }), "w: 1");
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("a missing template file is a configuration error", () => {
  const renderer = new FileTemplateRenderer(tmpdir());
  assert.throws(() => renderer.render("does-not-exist.yaml", {}), {
    message: 'Failed to load template "does-not-exist.yaml"',
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// Summary
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${"═".repeat(60)}`);
console.log(`  ${passed} passed, ${failed} failed, ${passed + failed} total`);
console.log(`${"═".repeat(60)}\n`);

if (failed > 0) {
  process.exit(1);
}
