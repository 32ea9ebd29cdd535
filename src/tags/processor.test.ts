/**
 * Tests for processor tags and language variants.
 *
 * Run: node --import tsx src/tags/processor.test.ts
 */

import { strict as assert } from "node:assert";

import type { MarkupRenderer } from "./index.js";
import { compileTags, parseTaggedKey, processTags } from "./index.js";

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

const markup: MarkupRenderer = {
  render: (text) => `<p>${text}</p>`,
};

// ═══════════════════════════════════════════════════════════════════════════
// KEY PARSING
// ═══════════════════════════════════════════════════════════════════════════

section("Tagged keys");

test("plain keys have no tags", () => {
  assert.deepEqual(parseTaggedKey("title"), { name: "title", tags: [] });
});

test("stacked tags are listed rightmost first", () => {
  assert.deepEqual(parseTaggedKey("body|rst|i18n"), { name: "body", tags: ["i18n", "rst"] });
});

test("a key made of a bare pipe is not tagged", () => {
  assert.deepEqual(parseTaggedKey("|i18n"), { name: "|i18n", tags: [] });
});

test("compiled entries are ordered shorter keys first", () => {
  const compiled = compileTags({ "title|i18n": null, b: 1, aa: 2, a: 3 });
  assert.deepEqual(
    compiled.entries.map((entry) => entry.rawKey),
    ["a", "b", "aa", "title|i18n"]
  );
});

test("unknown tags are rejected at compile time", () => {
  assert.throws(() => compileTags({ section: { "intro|md": "x" } }), {
    name: "ConfigError",
    message: 'Unsupported processor tag "md" in key "intro|md" at section',
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// VARIANTS
// ═══════════════════════════════════════════════════════════════════════════

section("Language variants");

test("a document without tags yields one identical variant", () => {
  const document = { title: "Hello", view_type: "access.types.stdasync.acceptFiles", list: [1, { a: null }] };
  assert.deepEqual(processTags(document, "en"), { en: document });
});

test("i18n values produce one variant per language", () => {
  const variants = processTags({ "title|i18n": { en: "A", fi: "B" }, view_type: "x" }, "en");
  assert.deepEqual(variants, {
    en: { title: "A", view_type: "x" },
    fi: { title: "B", view_type: "x" },
  });
});

test("the default language is present even when only others are given", () => {
  const variants = processTags({ "title|i18n": { fi: "Hei" } }, "en");
  assert.deepEqual(variants, { en: { title: null }, fi: { title: "Hei" } });
});

test("i18n inside sequences and nested mappings is resolved", () => {
  const variants = processTags(
    { fields: [{ "label|i18n": { en: "Name", sv: "Namn" } }], meta: { "hint|i18n": { en: "h" } } },
    "en"
  );
  assert.deepEqual(variants["sv"], { fields: [{ label: "Namn" }], meta: { hint: null } });
  assert.deepEqual(Object.keys(variants), ["en", "sv"]);
});

test("i18n on a non-mapping is an error", () => {
  assert.throws(() => processTags({ "title|i18n": "plain" }, "en"), {
    message: 'Value of "title|i18n" must be a mapping of language codes',
  });
});

test("rst renders markup through the renderer", () => {
  assert.deepEqual(processTags({ "intro|rst": "Hi" }, "en", { markup }), { en: { intro: "<p>Hi</p>" } });
});

test("rst without a renderer is an error", () => {
  assert.throws(() => processTags({ "intro|rst": "Hi" }, "en"), {
    message: 'Cannot render "intro|rst": no markup renderer configured',
  });
});

test("stacked tags apply i18n first, then rst", () => {
  const variants = processTags({ "body|rst|i18n": { en: "One", fi: "Yksi" } }, "en", { markup });
  assert.deepEqual(variants, { en: { body: "<p>One</p>" }, fi: { body: "<p>Yksi</p>" } });
});

test("the raw document is not modified", () => {
  const document = { "title|i18n": { en: "A" } };
  processTags(document, "en");
  assert.deepEqual(document, { "title|i18n": { en: "A" } });
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
