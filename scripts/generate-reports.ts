#!/usr/bin/env node
/**
 * Generate one Quarto report document per respondent in the reporting window.
 *
 * Usage:
 *   npm run generate -- [--input data/export.tsv] [--out output] [--start "2025-05-01 00:00:01"]
 *                       [--end "2025-08-05 12:59:00"] [--drop-incomplete] [--config report.yml] [--json]
 *
 * Writes output/<YYYY-MM-DD>/report_<respid>.qmd plus log.txt. Compiling the .qmd
 * files to PDF (quarto render) is a separate step.
 */

import "dotenv/config";
import { promises as fs } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { readSurveyExport } from "../lib/readSurveyExport";
import { cleanSurveyData } from "../lib/normalizeSurvey";
import { filterResponsesByWindow } from "../lib/filterWindow";
import { assertSurveyInputs, assertWindowNotEmpty } from "../lib/preflight/assertSurveyInputs";
import { listRespondentIds } from "../lib/respondents";
import { buildReportDocument, loadReportTemplate } from "../lib/buildReportDocument";
import { assertValidWindow, loadReportConfig, type ReportConfig } from "../lib/reportConfig";
import { formatRunSummary, logReportRun, logRespondentReport } from "../lib/runLog";

export type CliArgs = {
  input?: string;
  out?: string;
  start?: string;
  end?: string;
  config?: string;
  dropIncomplete: boolean;
  json: boolean;
};

/** Documents written concurrently per batch. */
const WRITE_BATCH_SIZE = 16;

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { dropIncomplete: false, json: false };
  for (let i = 0; i < argv.length; i += 1) {
    const a = argv[i];
    if (a === "--input") args.input = argv[i + 1], i += 1;
    else if (a === "--out") args.out = argv[i + 1], i += 1;
    else if (a === "--start") args.start = argv[i + 1], i += 1;
    else if (a === "--end") args.end = argv[i + 1], i += 1;
    else if (a === "--config") args.config = argv[i + 1], i += 1;
    else if (a === "--drop-incomplete") args.dropIncomplete = true;
    else if (a === "--json") args.json = true;
  }
  return args;
}

/** CLI flags win over report.yml and REPORT_* env values. */
export function applyCliArgs(config: ReportConfig, args: CliArgs): ReportConfig {
  return assertValidWindow({
    ...config,
    inputFile: args.input ?? config.inputFile,
    outputDir: args.out ?? config.outputDir,
    window: { start: args.start ?? config.window.start, end: args.end ?? config.window.end },
    dropIncomplete: args.dropIncomplete || config.dropIncomplete,
  });
}

function todayStamp(now: Date = new Date()): string {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, "0");
  const d = String(now.getDate()).padStart(2, "0");
  return `${y}-${m}-${d}`;
}

/**
 * Run one report generation. Every failure, config errors included, is logged as a
 * failed report_run event before it is rethrown.
 */
export async function generateReports(args: CliArgs): Promise<void> {
  const started = Date.now();
  let config: ReportConfig | undefined;

  try {
    config = applyCliArgs(loadReportConfig({ configPath: args.config }), args);
    const { start, end } = config.window;

    const raw = await readSurveyExport(config.inputFile);
    const data = cleanSurveyData(raw, { dropIncomplete: config.dropIncomplete });
    const filtered = filterResponsesByWindow(data, start, end, config.timestampField);
    assertWindowNotEmpty(filtered, start, end);

    const preflight = assertSurveyInputs(filtered, { branchQuestionId: config.branchQuestionId });
    for (const w of preflight.warnings) {
      console.warn(`[report-preflight] ${w.code}: ${w.message}`);
    }
    if (args.json) {
      console.log(`[report-preflight-summary] ${JSON.stringify(preflight.summary)}`);
    }

    const respondentIds = listRespondentIds(filtered);
    console.log(`[generate-reports] ${respondentIds.length} unique respondents in the selected window`);

    const template = loadReportTemplate(config.templateFile);
    const runDir = path.join(config.outputDir, todayStamp());
    await fs.mkdir(runDir, { recursive: true });

    const runConfig = config;
    for (let i = 0; i < respondentIds.length; i += WRITE_BATCH_SIZE) {
      const batch = respondentIds.slice(i, i + WRITE_BATCH_SIZE);
      await Promise.all(
        batch.map(async (respondentId) => {
          const doc = buildReportDocument({ data: filtered, respondentId, template, config: runConfig });
          await fs.writeFile(path.join(runDir, doc.fileName), doc.content, "utf8");
          logRespondentReport({
            respondent_id: respondentId,
            file: doc.fileName,
            sections: doc.sections.map((s) => s.code),
          });
        })
      );
    }

    await fs.writeFile(path.join(runDir, "log.txt"), formatRunSummary(start, end, respondentIds.length), "utf8");

    logReportRun({
      window_start: start,
      window_end: end,
      respondents: respondentIds.length,
      records: filtered.length,
      duration_ms: Date.now() - started,
      result: "success",
      output_dir: runDir,
      warning_counts: preflight.summary.warningCounts,
    });
    console.log(`✅ Report documents written - check ${runDir}`);
  } catch (e) {
    logReportRun({
      window_start: config?.window.start ?? args.start ?? "",
      window_end: config?.window.end ?? args.end ?? "",
      respondents: 0,
      records: 0,
      duration_ms: Date.now() - started,
      result: "fail",
      error_message: e instanceof Error ? e.message : String(e),
    });
    throw e;
  }
}

const isEntry = process.argv[1] !== undefined && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url);

if (isEntry) {
  generateReports(parseArgs(process.argv.slice(2))).catch((err: unknown) => {
    console.error("[generate-reports] failed:", err instanceof Error ? err.message : err);
    process.exit(1);
  });
}
