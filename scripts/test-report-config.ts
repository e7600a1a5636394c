import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import {
  DEFAULT_REPORT_CONFIG,
  applyEnvOverrides,
  assertValidWindow,
  loadReportConfig,
  parseReportConfig,
} from "../lib/reportConfig";

test("parseReportConfig fills gaps from defaults", () => {
  const config = parseReportConfig({ output_dir: "reports", window: { end: "2025-07-01 00:00:00" } });
  assert.equal(config.outputDir, "reports");
  assert.equal(config.inputFile, DEFAULT_REPORT_CONFIG.inputFile);
  assert.deepEqual(config.window, { start: "2025-05-01 00:00:01", end: "2025-07-01 00:00:00" });
  assert.equal(parseReportConfig(null), DEFAULT_REPORT_CONFIG);
});

test("unquoted YAML timestamps are kept as ISO text", () => {
  const config = parseReportConfig({ window: { start: new Date(Date.UTC(2025, 4, 1, 0, 0, 1)) } });
  assert.equal(config.window.start, "2025-05-01T00:00:01.000Z");
});

test("invalid documents are rejected with a tagged error", () => {
  assert.throws(() => parseReportConfig("nope"), /\[report-config\] report config must be a mapping/);
  assert.throws(() => parseReportConfig({ timestamp_field: "respid" }), /timestamp_field must be one of/);
  assert.throws(() => parseReportConfig({ base_question_numbers: [5, "6"] }), /base_question_numbers/);
  assert.throws(
    () =>
      parseReportConfig({
        selection_lookup: [
          { selection: "A", code: "a" },
          { selection: "B", code: "a" },
        ],
      }),
    /codes must be unique/
  );
});

test("REPORT_* environment values override the file", () => {
  const config = applyEnvOverrides(DEFAULT_REPORT_CONFIG, {
    REPORT_WINDOW_START: "2025-06-01 00:00:00",
    REPORT_OUTPUT_DIR: " ",
    REPORT_DROP_INCOMPLETE: "yes",
  });
  assert.equal(config.window.start, "2025-06-01 00:00:00");
  assert.equal(config.window.end, DEFAULT_REPORT_CONFIG.window.end);
  assert.equal(config.outputDir, DEFAULT_REPORT_CONFIG.outputDir);
  assert.equal(config.dropIncomplete, true);
});

test("a window whose start is after its end is rejected", () => {
  const config = { ...DEFAULT_REPORT_CONFIG, window: { start: "2025-09-01 00:00:00", end: "2025-08-01 00:00:00" } };
  assert.throws(() => assertValidWindow(config), /\[report-config\] window start 2025-09-01 00:00:00 is after end/);
  const bad = { ...DEFAULT_REPORT_CONFIG, window: { start: "soon", end: "2025-08-01 00:00:00" } };
  assert.throws(() => assertValidWindow(bad), /window start is not a valid timestamp: soon/);
});

test("loadReportConfig reads an explicit file and applies env overrides", () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "report-config-"));
  try {
    const configPath = path.join(dir, "report.yml");
    fs.writeFileSync(
      configPath,
      [
        "input_file: exports/june.tsv",
        "window:",
        '  start: "2025-06-01 00:00:00"',
        '  end: "2025-06-30 23:59:59"',
        "selection_lookup:",
        '  - selection: "Widgets"',
        "    code: w",
        "",
      ].join("\n")
    );
    const config = loadReportConfig({ configPath, env: { REPORT_WINDOW_END: "2025-06-15 00:00:00" } });
    assert.equal(config.inputFile, "exports/june.tsv");
    assert.deepEqual(config.window, { start: "2025-06-01 00:00:00", end: "2025-06-15 00:00:00" });
    assert.deepEqual(config.selectionLookup, [{ selection: "Widgets", code: "w" }]);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
});

test("an explicit config path that does not exist is an error", () => {
  assert.throws(
    () => loadReportConfig({ configPath: path.join(os.tmpdir(), "no-such-report-config.yml"), env: {} }),
    /\[report-config\] config file not found/
  );
});
