import assert from "node:assert/strict";
import test from "node:test";
import yaml from "js-yaml";
import {
  buildFrontMatter,
  buildReportDocument,
  buildRespondentIntro,
  renderTemplate,
} from "../lib/buildReportDocument";
import { artifactName, getRespondentInfo, listRespondentIds } from "../lib/respondents";
import { makeRecord } from "./fixtures/surveyRecords";

const TEMPLATE = "{{RESPONDENT_INTRO}}\n\\newpage\n{{EVALUATION_SECTIONS}}\n";

function frontMatterOf(content: string): unknown {
  const match = /^---\n([\s\S]*?)---\n/.exec(content);
  assert.ok(match, "document should open with a front matter block");
  return yaml.load(match[1]);
}

test("getRespondentInfo takes the first non-empty value and makes the customer file-safe", () => {
  const data = [
    makeRecord({ respondent_id: "r1", first_name: null, customer: "  " }),
    makeRecord({ respondent_id: "r1", first_name: " Ann ", customer: "North/South Ltd" }),
    makeRecord({ respondent_id: "r2", first_name: "Bo" }),
  ];
  const info = getRespondentInfo(data, "r1");
  assert.deepEqual(info, { respondent_id: "r1", first_name: "Ann", last_name: "Lee", customer: "North-South Ltd" });
  assert.equal(artifactName(info), "Online Results - North-South Ltd, Ann Lee");
  assert.deepEqual(listRespondentIds(data), ["r1", "r2"]);
});

test("front matter carries the output file and respondent parameter", () => {
  const header = buildFrontMatter({ respondent_id: "1042", first_name: "Ann", last_name: "Lee", customer: "Acme" });
  assert.ok(header.startsWith("---\n"));
  assert.ok(header.endsWith("\n---"));
  assert.deepEqual(yaml.load(header.slice(4, -3)), {
    "output-file": "Online Results - Acme, Ann Lee.pdf",
    params: { respid: "1042" },
  });
});

test("renderTemplate inserts values literally and blanks unknown placeholders", () => {
  const out = renderTemplate("A {{RESPONDENT_INTRO}} B {{MISSING}} C {{EVALUATION_SECTIONS}}", {
    RESPONDENT_INTRO: "costs \\$5 and $& more",
    EVALUATION_SECTIONS: "x",
  });
  assert.equal(out, "A costs \\$5 and $& more B  C x");
});

test("respondent intro escapes dataset text", () => {
  const rows = [makeRecord({ customer: "R&D / Labs", country: "Canada_East" })];
  const info = getRespondentInfo(rows, "r1");
  const intro = buildRespondentIntro(rows, info, []);
  assert.equal(
    intro,
    [
      "# Respondent Overview",
      "",
      "**Name:** Ann Lee  ",
      "**Title:** Director  ",
      "**Organization:** R\\&D - Labs  ",
      "**Country:** Canada\\_East  ",
      "**Survey completed:** 2025-06-01 10:00:00",
      "",
      "No product line evaluations were recorded for this respondent.",
    ].join("\n")
  );
});

test("buildReportDocument assembles front matter, intro and evaluation sections", () => {
  const data = [
    makeRecord({ respondent_id: "r1", customer: "R&D / Labs", question_id: "q3", response_value: "[Vendor] [Sector 2]" }),
    makeRecord({ respondent_id: "r1", question_id: "q5b", question_stem_text: "Rate it", sub_item_text: "Speed", response_value: "4" }),
    makeRecord({ respondent_id: "r2", first_name: "Bo", question_id: "q3", response_value: "Other" }),
  ];

  const doc = buildReportDocument({ data, respondentId: "r1", template: TEMPLATE });

  assert.equal(doc.fileName, "report_r1.qmd");
  assert.equal(doc.outputFile, "Online Results - R&D - Labs, Ann Lee.pdf");
  assert.deepEqual(frontMatterOf(doc.content), {
    "output-file": "Online Results - R&D - Labs, Ann Lee.pdf",
    params: { respid: "r1" },
  });
  assert.deepEqual(doc.sections, [{ code: "b", selection: "[Vendor] [Sector 2]", questionIds: ["q5b"] }]);
  assert.ok(doc.content.includes("\nProduct lines evaluated: [Vendor] [Sector 2].\n\\newpage\n# Evaluation of [Vendor] [Sector 2]\n"));
  assert.ok(doc.content.includes("## **q5b.** Rate it\n"));
  assert.ok(doc.content.includes("\nSpeed & 4 \\\\ \\addlinespace[0.2cm]\n"));
});

test("a respondent with no selections gets the intro and an empty evaluation slot", () => {
  const data = [makeRecord({ respondent_id: "r2", first_name: "Bo", question_id: "q3", response_value: "Other" })];
  const doc = buildReportDocument({ data, respondentId: "r2", template: TEMPLATE });
  assert.deepEqual(doc.sections, []);
  assert.ok(doc.content.endsWith("No product line evaluations were recorded for this respondent.\n\\newpage\n\n"));
});

test("evaluation sections come from the respondent's own rows, not the whole working set", () => {
  const data = [
    makeRecord({ respondent_id: "r1", question_id: "q3", response_value: "[Vendor] [Sector 3]" }),
    makeRecord({ respondent_id: "r2", first_name: "Bo", question_id: "q3", response_value: "[Vendor] [Sector 3]" }),
    makeRecord({ respondent_id: "r2", first_name: "Bo", question_id: "q5c", question_stem_text: "Rate it", response_value: "4" }),
  ];

  const skipped = buildReportDocument({ data, respondentId: "r1", template: TEMPLATE });
  assert.deepEqual(skipped.sections, []);
  assert.ok(!skipped.content.includes("# Evaluation of"));

  const answered = buildReportDocument({ data, respondentId: "r2", template: TEMPLATE });
  assert.deepEqual(answered.sections, [{ code: "c", selection: "[Vendor] [Sector 3]", questionIds: ["q5c"] }]);
});
