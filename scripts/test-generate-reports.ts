import assert from "node:assert/strict";
import os from "node:os";
import path from "node:path";
import test from "node:test";
import { applyCliArgs, generateReports, parseArgs } from "./generate-reports";
import { DEFAULT_REPORT_CONFIG } from "../lib/reportConfig";
import { formatRunSummary } from "../lib/runLog";

test("parseArgs reads value flags and switches", () => {
  const args = parseArgs([
    "--input",
    "exports/june.tsv",
    "--start",
    "2025-06-01 00:00:00",
    "--drop-incomplete",
    "--json",
    "--unknown",
  ]);
  assert.deepEqual(args, {
    input: "exports/june.tsv",
    start: "2025-06-01 00:00:00",
    dropIncomplete: true,
    json: true,
  });
  assert.deepEqual(parseArgs([]), { dropIncomplete: false, json: false });
});

test("CLI flags override the loaded config", () => {
  const config = applyCliArgs(DEFAULT_REPORT_CONFIG, parseArgs(["--out", "tmp/reports", "--end", "2025-07-01 00:00:00"]));
  assert.equal(config.outputDir, "tmp/reports");
  assert.deepEqual(config.window, { start: DEFAULT_REPORT_CONFIG.window.start, end: "2025-07-01 00:00:00" });
  assert.equal(config.dropIncomplete, false);
  assert.equal(config.inputFile, DEFAULT_REPORT_CONFIG.inputFile);
});

test("a CLI window that runs backwards is rejected", () => {
  assert.throws(
    () => applyCliArgs(DEFAULT_REPORT_CONFIG, parseArgs(["--start", "2025-09-01 00:00:00", "--end", "2025-01-01 00:00:00"])),
    /\[report-config\] window start 2025-09-01 00:00:00 is after end 2025-01-01 00:00:00/
  );
});

test("run summary lists the window and respondent count", () => {
  assert.equal(
    formatRunSummary("2025-05-01 00:00:01", "2025-08-05 12:59:00", 12),
    "Start Date: 2025-05-01 00:00:01\nEnd Date: 2025-08-05 12:59:00\nNumber of Respondents: 12"
  );
});

function runEvents(lines: unknown[]): Array<Record<string, unknown>> {
  return lines
    .filter((line): line is string => typeof line === "string" && line.startsWith("{"))
    .map((line): unknown => JSON.parse(line))
    .filter((event): event is Record<string, unknown> => typeof event === "object" && event !== null)
    .filter((event) => event.event === "report_run");
}

test("a missing config file is logged as a failed run before the error surfaces", async (t) => {
  const log = t.mock.method(console, "log", () => {});
  const configPath = path.join(os.tmpdir(), "no-such-report-config.yml");

  await assert.rejects(
    () => generateReports(parseArgs(["--config", configPath, "--start", "2025-06-01 00:00:00"])),
    /\[report-config\] config file not found/
  );

  const events = runEvents(log.mock.calls.map((call) => call.arguments[0]));
  assert.equal(events.length, 1);
  assert.equal(events[0].result, "fail");
  assert.equal(events[0].window_start, "2025-06-01 00:00:00");
  assert.equal(events[0].window_end, "");
  assert.equal(events[0].error_message, `[report-config] config file not found: ${configPath}`);
});

test("a backwards CLI window is logged as a failed run", async (t) => {
  const log = t.mock.method(console, "log", () => {});

  await assert.rejects(
    () => generateReports(parseArgs(["--start", "2025-09-01 00:00:00", "--end", "2025-01-01 00:00:00"])),
    /window start 2025-09-01 00:00:00 is after end/
  );

  const events = runEvents(log.mock.calls.map((call) => call.arguments[0]));
  assert.equal(events.length, 1);
  assert.equal(events[0].result, "fail");
  assert.equal(events[0].window_end, "2025-01-01 00:00:00");
});
