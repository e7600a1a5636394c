import assert from "node:assert/strict";
import test from "node:test";
import {
  SECTION_RULE,
  buildConditionalSections,
  dependentQuestionIds,
  keepCodesWithQuestions,
  parseBranchSelections,
  resolveSelectionCodes,
} from "../lib/conditionalSections";
import { createScoreTable } from "../lib/latexTable";
import { DEFAULT_SELECTION_LOOKUP } from "../lib/reportConfig";
import type { SurveyRecord } from "../lib/surveyTypes";
import { makeRecord } from "./fixtures/surveyRecords";

const FOOTNOTE = "\\scriptsize 5-point scale: 1=Strongly Disagree; 5=Strongly Agree\\normalsize\n\n";

function branch(answer: string, respondentId = "r1"): SurveyRecord {
  return makeRecord({ respondent_id: respondentId, question_id: "q3", question_stem_text: "Which product lines?", response_value: answer });
}

function item(qid: string, stem: string, label: string, score: string, respondentId = "r1"): SurveyRecord {
  return makeRecord({
    respondent_id: respondentId,
    question_id: qid,
    question_stem_text: stem,
    sub_item_text: label,
    response_value: score,
  });
}

test("parseBranchSelections splits on commas after removing parentheticals and 'and'", () => {
  assert.deepEqual(parseBranchSelections("[Vendor] [Sector 1] (mainly, hardware), [Vendor] [Sector 3], and [Vendor] [Sector 2]"), [
    "[Vendor] [Sector 1]",
    "[Vendor] [Sector 3]",
    "[Vendor] [Sector 2]",
  ]);
});

test("parseBranchSelections clears one level of nested parentheticals", () => {
  assert.deepEqual(parseBranchSelections("[Vendor] [Sector 1] (see (note) here), Other"), ["[Vendor] [Sector 1]", "Other"]);
});

test("parseBranchSelections removes only the first whole word 'and'", () => {
  assert.deepEqual(parseBranchSelections("A, and B, and C"), ["A", "B", "and C"]);
  assert.deepEqual(parseBranchSelections("Standard tier"), ["Standard tier"]);
  assert.deepEqual(parseBranchSelections(""), []);
});

test("resolveSelectionCodes returns lookup-table order and drops unknown labels", () => {
  const entries = resolveSelectionCodes(["[Vendor] [Sector 3]", "Something else", "[Vendor] [Sector 1]"], DEFAULT_SELECTION_LOOKUP);
  assert.deepEqual(entries.map((e) => e.code), ["a", "c"]);
});

test("keepCodesWithQuestions drops codes with no dependent question in the data", () => {
  const data = [item("q8c", "Stem", "x", "1")];
  const kept = keepCodesWithQuestions(DEFAULT_SELECTION_LOOKUP, data, [5, 6, 7, 8, 9, 10]);
  assert.deepEqual(kept.map((e) => e.code), ["c"]);
  assert.deepEqual(dependentQuestionIds("b", [5, 10]), ["q5b", "q10b"]);
});

test("one selection renders a header, then each non-empty dependent question in base order", () => {
  const data = [
    branch("[Vendor] [Sector 1]"),
    item("q7a", "Overall", "Value", "3"),
    item("q5a", "Rate the product", "Ease of use", "4"),
    item("q5a", "Rate the product", "R&D support", "5"),
  ];
  const result = buildConditionalSections(data);

  const expected = [
    `# Evaluation of [Vendor] [Sector 1]\n${SECTION_RULE}\n`,
    "## **q5a.** Rate the product\n",
    createScoreTable(["4", "5"], ["Ease of use", "R\\&D support"]),
    FOOTNOTE,
    "## **q7a.** Overall\n",
    createScoreTable(["3"], ["Value"]),
    FOOTNOTE,
  ].join("\n");

  assert.equal(result.markdown, expected);
  assert.deepEqual(result.sections, [{ code: "a", selection: "[Vendor] [Sector 1]", questionIds: ["q5a", "q7a"] }]);
});

test("a branch answer with no known selection yields no sections", () => {
  const data = [branch("Another vendor (not listed)"), item("q5a", "Stem", "x", "1")];
  const result = buildConditionalSections(data);
  assert.equal(result.markdown, "");
  assert.deepEqual(result.sections, []);
});

test("a respondent without the branch question yields no sections", () => {
  const result = buildConditionalSections([item("q5a", "Stem", "x", "1")]);
  assert.deepEqual(result, { markdown: "", sections: [] });
});

test("sections follow lookup order across several branch rows", () => {
  const data = [
    branch("[Vendor] [Sector 4]"),
    branch("[Vendor] [Sector 2], and [Vendor] [Sector 1]"),
    item("q5a", "A stem", "x", "1"),
    item("q5b", "B stem", "y", "2"),
    item("q6d", "D stem", "z", "3"),
  ];
  const result = buildConditionalSections(data);
  assert.deepEqual(
    result.sections.map((s) => [s.code, s.questionIds]),
    [
      ["a", ["q5a"]],
      ["b", ["q5b"]],
      ["d", ["q6d"]],
    ]
  );
});

test("a selection keeps its header while an empty dependent question gets no table", () => {
  const data = [branch("[Vendor] [Sector 2]"), item("q5b", "B stem", "Speed", "2")];
  const result = buildConditionalSections(data);

  const expected = [
    `# Evaluation of [Vendor] [Sector 2]\n${SECTION_RULE}\n`,
    "## **q5b.** B stem\n",
    createScoreTable(["2"], ["Speed"]),
    FOOTNOTE,
  ].join("\n");

  assert.equal(result.markdown, expected);
  assert.ok(!result.markdown.includes("q6b"));
  assert.deepEqual(result.sections, [{ code: "b", selection: "[Vendor] [Sector 2]", questionIds: ["q5b"] }]);
});

test("a selected block the respondent skipped is dropped even when others answered it", () => {
  const everyone = [
    branch("[Vendor] [Sector 3]", "r1"),
    item("q5c", "C stem", "Speed", "4", "r2"),
  ];
  const ownRows = everyone.filter((r) => r.respondent_id === "r1");
  assert.deepEqual(buildConditionalSections(ownRows), { markdown: "", sections: [] });
});

test("dataset and lookup text is escaped before it is embedded", () => {
  const data = [
    branch("R&D Tools (beta)"),
    item("q5r", "Rate 100% of it", "Speed_ms", "4"),
  ];
  const result = buildConditionalSections(data, {
    selectionLookup: [{ selection: "R&D Tools", code: "r" }],
    baseQuestionNumbers: [5],
    scaleFootnote: "Scale 1-5",
  });
  assert.ok(result.markdown.startsWith(`# Evaluation of R\\&D Tools\n${SECTION_RULE}\n`));
  assert.ok(result.markdown.includes("## **q5r.** Rate 100\\% of it\n"));
  assert.ok(result.markdown.includes("\nSpeed\\_ms & 4 \\\\ \\addlinespace[0.2cm]\n"));
  assert.ok(result.markdown.endsWith("\\scriptsize Scale 1-5\\normalsize\n\n"));
});

test("duplicate stems in a dependent question are reported through the handler", () => {
  const data = [
    branch("[Vendor] [Sector 1]"),
    item("q5a", "First wording", "x", "1"),
    item("q5a", "Second wording", "y", "2"),
  ];
  const seen: string[] = [];
  const result = buildConditionalSections(data, { onDuplicateStem: (qid) => seen.push(qid) });
  assert.deepEqual(seen, ["q5a"]);
  assert.ok(result.markdown.includes("## **q5a.** First wording\n"));
});
