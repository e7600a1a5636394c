import assert from "node:assert/strict";
import test from "node:test";
import { escapeLatex, escapeLatexInline, stripTags } from "../lib/sanitizeLatex";

const SPECIALS = ["\\", "&", "%", "$", "#", "_", "{", "}", "~", "^"];

test("stripTags removes tags non-greedily", () => {
  assert.equal(stripTags("a<b>c</b>d"), "acd");
  assert.equal(stripTags("no tags"), "no tags");
  assert.equal(stripTags('<p class="x">How <em>often</em>?</p>'), "How often?");
  assert.equal(stripTags("1 < 2 and 3 > 2"), "1  2");
});

test("stripTags treats absent input as empty and maps arrays elementwise", () => {
  assert.equal(stripTags(null), "");
  assert.equal(stripTags(undefined), "");
  assert.equal(stripTags(""), "");
  assert.deepEqual(stripTags(["<i>a</i>", null, "b"]), ["a", "", "b"]);
});

test("escapeLatex prefixes standard specials with a backslash", () => {
  assert.equal(escapeLatex("20% & rising"), "20\\% \\& rising");
  assert.equal(escapeLatex("$5 #1 a_b {x}"), "\\$5 \\#1 a\\_b \\{x\\}");
});

test("escapeLatex replaces tilde, caret and backslash with text commands", () => {
  assert.equal(escapeLatex("~^"), "\\textasciitilde{}\\textasciicircum{}");
  // braces added by the backslash rule are escaped by the brace rule that runs after it
  assert.equal(escapeLatex("\\"), "\\textbackslash\\{\\}");
  assert.equal(escapeLatex("a\\b~c"), "a\\textbackslash\\{\\}b\\textasciitilde{}c");
});

test("escapeLatex leaves plain text and empty input alone", () => {
  assert.equal(escapeLatex("Plain text, 5 stars."), "Plain text, 5 stars.");
  assert.equal(escapeLatex(""), "");
  assert.equal(escapeLatex(null), "");
  assert.deepEqual(escapeLatex(["R&D", null]), ["R\\&D", ""]);
});

test("escapeLatex is not idempotent: escaped text changes when escaped again", () => {
  const once = escapeLatex("a&b");
  const twice = escapeLatex(once);
  assert.equal(once, "a\\&b");
  assert.equal(twice, "a\\textbackslash\\{\\}\\&b");
  assert.notEqual(twice, once);
});

test("escapeLatexInline matches escapeLatex for every string of specials up to length 3", () => {
  const inputs: string[] = [""];
  let frontier = [""];
  for (let len = 1; len <= 3; len += 1) {
    frontier = frontier.flatMap((prefix) => SPECIALS.map((s) => prefix + s));
    inputs.push(...frontier);
  }
  assert.equal(inputs.length, 1 + 10 + 100 + 1000);
  for (const input of inputs) {
    assert.equal(escapeLatexInline(input), escapeLatex(input), `mismatch for ${JSON.stringify(input)}`);
  }
});

test("escapeLatexInline matches escapeLatex on mixed text", () => {
  const samples = ["50% & $5", "Use ^ and ~", "C:\\temp\\{new}", "a_b#c", "{\\}"];
  assert.deepEqual(escapeLatexInline(samples), escapeLatex(samples));
});
