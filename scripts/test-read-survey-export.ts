import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { parseSurveyExport, readSurveyExport } from "../lib/readSurveyExport";

test("tab-delimited text becomes a raw table with NA and blanks as null", () => {
  const table = parseSurveyExport("a\tb\n1\tNA\n\n2\t\n");
  assert.deepEqual(table.columns, ["a", "b"]);
  assert.deepEqual(table.rows, [
    { a: "1", b: null },
    { a: "2", b: null },
  ]);
});

test("a byte order mark does not leak into the first column name", () => {
  const table = parseSurveyExport("\uFEFFrespid\tqid\nr1\tq3\n");
  assert.deepEqual(table.columns, ["respid", "qid"]);
  assert.deepEqual(table.rows, [{ respid: "r1", qid: "q3" }]);
});

test("short rows are kept with the missing cells as null", () => {
  const table = parseSurveyExport("a\tb\n3\n");
  assert.deepEqual(table.rows, [{ a: "3", b: null }]);
});

test("commas inside cells are kept as text", () => {
  const table = parseSurveyExport("response\n[Vendor] [Sector 1], and [Vendor] [Sector 2]\n");
  assert.deepEqual(table.rows, [{ response: "[Vendor] [Sector 1], and [Vendor] [Sector 2]" }]);
});

test("a cell opening with a double quote does not swallow the rows after it", () => {
  const table = parseSurveyExport('respid\tresponse\nr1\t"Great vendor, would recommend\nr2\t4\nr3\t5\n');
  assert.deepEqual(table.rows, [
    { respid: "r1", response: '"Great vendor, would recommend' },
    { respid: "r2", response: "4" },
    { respid: "r3", response: "5" },
  ]);
});

test("quotes inside a cell are kept as written", () => {
  const table = parseSurveyExport('response\nSaid "fine" twice\n');
  assert.deepEqual(table.rows, [{ response: 'Said "fine" twice' }]);
});

test("readSurveyExport loads a file from disk", async () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "survey-export-"));
  try {
    const file = path.join(dir, "export.tsv");
    fs.writeFileSync(file, "respid\tresponse\nr1\t4\nr2\tNA\n");
    const table = await readSurveyExport(file);
    assert.deepEqual(table.rows, [
      { respid: "r1", response: "4" },
      { respid: "r2", response: null },
    ]);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});
