import assert from "node:assert/strict";
import test from "node:test";
import {
  findDuplicateStems,
  getQuestionStem,
  getResponses,
  getSubItemLabels,
  listQuestionIds,
} from "../lib/questionAccessors";
import { makeRecord } from "./fixtures/surveyRecords";

const data = [
  makeRecord({ question_id: "q5a", question_stem_text: "Rate the product", sub_item_text: "Ease of use", response_value: "4" }),
  makeRecord({ question_id: "q6a", question_stem_text: "Rate support", sub_item_text: "Speed", response_value: "2" }),
  makeRecord({ question_id: "q5a", question_stem_text: "Rate the product", sub_item_text: "Reliability", response_value: null }),
  makeRecord({ question_id: "q5a", question_stem_text: "Rate the product", sub_item_text: "Price", response_value: "5" }),
];

test("responses and labels are index-aligned in row order", () => {
  assert.deepEqual(getResponses(data, "q5a"), ["4", null, "5"]);
  assert.deepEqual(getSubItemLabels(data, "q5a"), ["Ease of use", "Reliability", "Price"]);
});

test("a missing question yields empty results, not an error", () => {
  assert.equal(getQuestionStem(data, "q9z"), undefined);
  assert.deepEqual(getResponses(data, "q9z"), []);
  assert.deepEqual(getSubItemLabels(data, "q9z"), []);
});

test("getQuestionStem returns the distinct stem", () => {
  assert.equal(getQuestionStem(data, "q5a"), "Rate the product");
});

test("non-distinct stems: first wins and the anomaly is reported", () => {
  const dup = [
    makeRecord({ question_id: "q7b", question_stem_text: "Old wording" }),
    makeRecord({ question_id: "q7b", question_stem_text: "New wording" }),
    makeRecord({ question_id: "q7b", question_stem_text: "Old wording" }),
  ];
  const reported: Array<[string, string[]]> = [];
  const stem = getQuestionStem(dup, "q7b", (qid, stems) => reported.push([qid, stems]));
  assert.equal(stem, "Old wording");
  assert.deepEqual(reported, [["q7b", ["Old wording", "New wording"]]]);
  assert.deepEqual(findDuplicateStems([...dup, ...data]), [{ qid: "q7b", stems: ["Old wording", "New wording"] }]);
});

test("listQuestionIds keeps first-appearance order", () => {
  assert.deepEqual(listQuestionIds(data), ["q5a", "q6a"]);
});
