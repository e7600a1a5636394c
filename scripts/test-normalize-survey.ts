import assert from "node:assert/strict";
import test from "node:test";
import { cleanSurveyData, loadColumnMapping, parseColumnMapping, renumberSubItems } from "../lib/normalizeSurvey";
import { RAW_COLUMNS, makeRawRow, makeRawTable, makeRecord } from "./fixtures/surveyRecords";

test("cleanSurveyData rejects tables without exactly 14 columns", () => {
  const thirteen = makeRawTable([makeRawRow()], RAW_COLUMNS.slice(0, 13));
  assert.throws(() => cleanSurveyData(thirteen), /\[survey-schema\] raw data has 13 columns, expected 14/);

  const fifteen = makeRawTable([makeRawRow()], [...RAW_COLUMNS, "extra"]);
  assert.throws(() => cleanSurveyData(fifteen), /raw data has 15 columns, expected 14/);
});

test("cleanSurveyData maps a 14 column export onto canonical fields", () => {
  const [record] = cleanSurveyData(makeRawTable([makeRawRow()]));
  assert.deepEqual(record, {
    respondent_id: "r1",
    first_name: "Ann",
    last_name: "Lee",
    title: "Director",
    customer: "Acme",
    country: "Canada",
    completed_at: "2025-06-01 10:00:00",
    question_id: "q1",
    sub_item_index: 1,
    question_stem_text: "Stem",
    sub_item_text: "Item",
    response_value: "3",
  });
  assert.ok(Object.isFrozen(record));
});

test("cleanSurveyData fails when a mapped column is absent", () => {
  const columns = RAW_COLUMNS.map((c) => (c === "qid" ? "question_code" : c));
  assert.throws(() => cleanSurveyData(makeRawTable([], columns)), /missing columns for: question_id/);
});

test("sub_item_index is renumbered densely per question in row order", () => {
  const rows = [
    makeRawRow({ qid: "q7c", sub_qid: null, sub_q_text: "first" }),
    makeRawRow({ qid: "q7c", sub_qid: "3", sub_q_text: "second" }),
    makeRawRow({ qid: "q7c", sub_qid: null, sub_q_text: "third" }),
  ];
  const out = cleanSurveyData(makeRawTable(rows));
  assert.deepEqual(
    out.map((r) => [r.sub_item_text, r.sub_item_index]),
    [
      ["first", 1],
      ["second", 2],
      ["third", 3],
    ]
  );
});

test("question groups come out in first-appearance order", () => {
  const rows = [
    makeRawRow({ qid: "q2", sub_q_text: "a" }),
    makeRawRow({ qid: "q1", sub_q_text: "b" }),
    makeRawRow({ qid: "q2", sub_q_text: "c" }),
  ];
  const out = cleanSurveyData(makeRawTable(rows));
  assert.deepEqual(
    out.map((r) => `${r.question_id}:${r.sub_item_index}:${r.sub_item_text}`),
    ["q2:1:a", "q2:2:c", "q1:1:b"]
  );
});

test("renumberSubItems does not touch its input", () => {
  const input = [makeRecord({ sub_item_index: 9 }), makeRecord({ sub_item_index: 4 })];
  const out = renumberSubItems(input);
  assert.deepEqual(out.map((r) => r.sub_item_index), [1, 2]);
  assert.deepEqual(input.map((r) => r.sub_item_index), [9, 4]);
});

test("text fields are cleaned", () => {
  const rows = [
    makeRawRow({
      pdf_export_customer: "A & B & C",
      response: ", and Other vendor  ",
      sub_q_text: "Vendor’s <b>support</b>",
      main_q_text: "<p>How satisfied are you?</p>",
    }),
  ];
  const [record] = cleanSurveyData(makeRawTable(rows));
  assert.equal(record.customer, "A and B and C");
  assert.equal(record.response_value, "Other vendor");
  assert.equal(record.sub_item_text, "Vendor's support");
  assert.equal(record.question_stem_text, "How satisfied are you?");
});

test("customer with a single ampersand reads as 'and'", () => {
  const [record] = cleanSurveyData(makeRawTable([makeRawRow({ pdf_export_customer: "A & B" })]));
  assert.equal(record.customer, "A and B");
});

test("dropIncomplete removes records missing respondent metadata", () => {
  const rows = [
    makeRawRow({ respid: "r1" }),
    makeRawRow({ respid: "r2", pdf_export_title: null }),
    makeRawRow({ respid: "r3", pdf_export_country: null }),
  ];
  const kept = cleanSurveyData(makeRawTable(rows), { dropIncomplete: true });
  assert.deepEqual(kept.map((r) => r.respondent_id), ["r1"]);

  const all = cleanSurveyData(makeRawTable(rows));
  assert.equal(all.length, 3);
});

test("parseColumnMapping validates the mapping document", () => {
  assert.equal(parseColumnMapping(null), null);
  assert.equal(parseColumnMapping({ expected_column_count: "14" }), null);
  const mapping = loadColumnMapping();
  assert.equal(mapping.expected_column_count, 14);
  assert.deepEqual(mapping.drop_columns, ["pdf_loop", "responseid"]);
  assert.deepEqual(mapping.canonical_fields.question_id.candidates, ["qid", "question_id"]);
});
