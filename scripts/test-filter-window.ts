import assert from "node:assert/strict";
import test from "node:test";
import { filterResponsesByWindow, toTimestamp } from "../lib/filterWindow";
import { makeRecord } from "./fixtures/surveyRecords";

const START = "2025-05-01 00:00:01";
const END = "2025-08-05 12:59:00";

test("window bounds are inclusive", () => {
  const records = [
    makeRecord({ respondent_id: "at-start", completed_at: START }),
    makeRecord({ respondent_id: "at-end", completed_at: END }),
    makeRecord({ respondent_id: "inside", completed_at: "2025-06-15 08:30:00" }),
  ];
  const kept = filterResponsesByWindow(records, START, END);
  assert.deepEqual(kept.map((r) => r.respondent_id), ["at-start", "at-end", "inside"]);
});

test("one second outside either bound is excluded", () => {
  const records = [
    makeRecord({ respondent_id: "before", completed_at: "2025-05-01 00:00:00" }),
    makeRecord({ respondent_id: "after", completed_at: "2025-08-05 12:59:01" }),
  ];
  assert.deepEqual(filterResponsesByWindow(records, START, END), []);
});

test("missing or unparseable timestamps are excluded", () => {
  const records = [
    makeRecord({ respondent_id: "none", completed_at: null }),
    makeRecord({ respondent_id: "junk", completed_at: "not a date" }),
  ];
  assert.deepEqual(filterResponsesByWindow(records, START, END), []);
});

test("bounds may be Date objects", () => {
  const records = [makeRecord({ completed_at: "2025-06-01 10:00:00" })];
  const kept = filterResponsesByWindow(
    records,
    new Date("2025-06-01T10:00:00Z"),
    new Date("2025-06-01T10:00:00Z")
  );
  assert.equal(kept.length, 1);
});

test("a different timestamp field can be used", () => {
  const records = [makeRecord({ completed_at: null, title: "2025-06-01 10:00:00" })];
  assert.equal(filterResponsesByWindow(records, START, END, "title").length, 1);
  assert.equal(filterResponsesByWindow(records, START, END).length, 0);
});

test("invalid bounds throw", () => {
  assert.throws(() => filterResponsesByWindow([], "not-a-date", END), /\[report-window\] invalid window bounds/);
});

test("toTimestamp reads export timestamps as UTC", () => {
  assert.equal(toTimestamp("2025-05-01 00:00:01"), Date.UTC(2025, 4, 1, 0, 0, 1));
  assert.equal(toTimestamp("2025-05-01T00:00"), Date.UTC(2025, 4, 1, 0, 0, 0));
  assert.equal(toTimestamp("2025-05-01"), Date.UTC(2025, 4, 1));
  assert.equal(toTimestamp(""), undefined);
  assert.equal(toTimestamp(undefined), undefined);
});
