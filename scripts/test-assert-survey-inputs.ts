import assert from "node:assert/strict";
import test from "node:test";
import {
  PREFLIGHT_WARNING_CODE,
  assertSurveyInputs,
  assertWindowNotEmpty,
} from "../lib/preflight/assertSurveyInputs";
import { makeRecord } from "./fixtures/surveyRecords";

test("an empty window fails the run", () => {
  assert.throws(
    () => assertWindowNotEmpty([], "2025-05-01 00:00:01", "2025-08-05 12:59:00"),
    /^Error: \[report-window\] no data in selected window \(2025-05-01 00:00:01 to 2025-08-05 12:59:00\)$/
  );
  assert.doesNotThrow(() => assertWindowNotEmpty([makeRecord()], "a", "b"));
});

test("clean data produces no warnings", () => {
  const data = [makeRecord({ question_id: "q3", response_value: "[Vendor] [Sector 1]" }), makeRecord({ question_id: "q5a" })];
  const result = assertSurveyInputs(data);
  assert.deepEqual(result.warnings, []);
  assert.deepEqual(result.summary, { warningCounts: {}, hasAnyWarning: false, respondentCount: 1, recordCount: 2 });
});

test("data anomalies are collected as coded warnings", () => {
  const data = [
    makeRecord({ respondent_id: "r1", question_id: "q3" }),
    makeRecord({ respondent_id: "r1", question_id: "q5a", question_stem_text: "Old" }),
    makeRecord({ respondent_id: "r1", question_id: "q5a", question_stem_text: "New", customer: "Acme Ltd" }),
    makeRecord({ respondent_id: "r2", question_id: "q5a", question_stem_text: "Old", country: null }),
  ];
  const result = assertSurveyInputs(data);

  assert.deepEqual(
    result.warnings.map((w) => w.code),
    [
      PREFLIGHT_WARNING_CODE.DUPLICATE_STEM,
      PREFLIGHT_WARNING_CODE.RESPONDENT_METADATA_INCONSISTENT,
      PREFLIGHT_WARNING_CODE.RESPONDENT_METADATA_MISSING,
      PREFLIGHT_WARNING_CODE.BRANCH_QUESTION_MISSING,
    ]
  );
  assert.equal(result.warnings[0].message, "q5a has 2 distinct stems; reports use the first");
  assert.deepEqual(result.warnings[1].meta, { respondent_id: "r1", fields: ["customer"] });
  assert.equal(result.warnings[2].message, "Respondent r2 has no country");
  assert.equal(result.summary.hasAnyWarning, true);
  assert.equal(result.summary.respondentCount, 2);
  assert.equal(result.summary.warningCounts[PREFLIGHT_WARNING_CODE.DUPLICATE_STEM], 1);
});

test("the branch question id is configurable", () => {
  const data = [makeRecord({ question_id: "q4" })];
  assert.equal(assertSurveyInputs(data, { branchQuestionId: "q4" }).warnings.length, 0);
  assert.equal(assertSurveyInputs(data).warnings[0].code, PREFLIGHT_WARNING_CODE.BRANCH_QUESTION_MISSING);
});
