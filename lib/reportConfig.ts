/**
 * Report run configuration
 *
 * Loaded from report.yml, then overridden by REPORT_* environment variables.
 * The run script loads .env (dotenv) before calling loadReportConfig, so
 * process.env already carries any .env values here.
 */

import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import yaml from "js-yaml";
import { toTimestamp } from "./filterWindow";
import { SURVEY_FIELDS, type SelectionLookupEntry, type SurveyField } from "./surveyTypes";

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

export type ReportConfig = {
  inputFile: string;
  outputDir: string;
  templateFile: string;
  window: { start: string; end: string };
  timestampField: SurveyField;
  dropIncomplete: boolean;
  branchQuestionId: string;
  baseQuestionNumbers: number[];
  selectionLookup: SelectionLookupEntry[];
  scaleFootnote: string;
};

export const DEFAULT_SELECTION_LOOKUP: SelectionLookupEntry[] = [
  { selection: "[Vendor] [Sector 1]", code: "a" },
  { selection: "[Vendor] [Sector 2]", code: "b" },
  { selection: "[Vendor] [Sector 3]", code: "c" },
  { selection: "[Vendor] [Sector 4]", code: "d" },
];

export const DEFAULT_REPORT_CONFIG: ReportConfig = {
  inputFile: "data/survey_export.tsv",
  outputDir: "output",
  templateFile: "templates/report_template.qmd",
  window: { start: "2025-05-01 00:00:01", end: "2025-08-05 12:59:00" },
  timestampField: "completed_at",
  dropIncomplete: false,
  branchQuestionId: "q3",
  baseQuestionNumbers: [5, 6, 7, 8, 9, 10],
  selectionLookup: DEFAULT_SELECTION_LOOKUP,
  scaleFootnote: "5-point scale: 1=Strongly Disagree; 5=Strongly Agree",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isSurveyField(value: unknown): value is SurveyField {
  return SURVEY_FIELDS.some((field) => field === value);
}

function configError(message: string): Error {
  return new Error(`[report-config] ${message}`);
}

/** YAML reads unquoted timestamps as Date; keep bounds as text either way. */
function readBound(value: unknown, name: string): string | undefined {
  if (value == null) return undefined;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string" || typeof value === "number") return String(value);
  throw configError(`window.${name} must be a timestamp`);
}

function readString(value: unknown, name: string): string | undefined {
  if (value == null) return undefined;
  if (typeof value !== "string" || !value.trim()) throw configError(`${name} must be a non-empty string`);
  return value;
}

function readBoolean(value: unknown, name: string): boolean | undefined {
  if (value == null) return undefined;
  if (typeof value === "boolean") return value;
  if (typeof value === "string") {
    const v = value.trim().toLowerCase();
    if (v === "true" || v === "1" || v === "yes") return true;
    if (v === "false" || v === "0" || v === "no" || v === "") return false;
  }
  throw configError(`${name} must be true or false`);
}

function readLookup(value: unknown): SelectionLookupEntry[] | undefined {
  if (value == null) return undefined;
  if (!Array.isArray(value)) throw configError("selection_lookup must be a list");
  const entries = value.map((entry: unknown, i) => {
    if (!isRecord(entry) || typeof entry.selection !== "string" || typeof entry.code !== "string") {
      throw configError(`selection_lookup[${i}] needs string selection and code`);
    }
    return { selection: entry.selection, code: entry.code };
  });
  const codes = new Set(entries.map((e) => e.code));
  if (codes.size !== entries.length) throw configError("selection_lookup codes must be unique");
  return entries;
}

function readQuestionNumbers(value: unknown): number[] | undefined {
  if (value == null) return undefined;
  if (!Array.isArray(value) || !value.every((n): n is number => typeof n === "number" && Number.isInteger(n))) {
    throw configError("base_question_numbers must be a list of integers");
  }
  return value;
}

/**
 * Validate a parsed report.yml document, filling gaps from DEFAULT_REPORT_CONFIG.
 */
export function parseReportConfig(data: unknown, base: ReportConfig = DEFAULT_REPORT_CONFIG): ReportConfig {
  if (data == null) return base;
  if (!isRecord(data)) throw configError("report config must be a mapping");

  const bounds = data.window == null ? {} : data.window;
  if (!isRecord(bounds)) throw configError("window must be a mapping with start and end");

  const timestampField = data.timestamp_field ?? base.timestampField;
  if (!isSurveyField(timestampField)) {
    throw configError(`timestamp_field must be one of ${SURVEY_FIELDS.join(", ")}`);
  }

  return {
    inputFile: readString(data.input_file, "input_file") ?? base.inputFile,
    outputDir: readString(data.output_dir, "output_dir") ?? base.outputDir,
    templateFile: readString(data.template_file, "template_file") ?? base.templateFile,
    window: {
      start: readBound(bounds.start, "start") ?? base.window.start,
      end: readBound(bounds.end, "end") ?? base.window.end,
    },
    timestampField,
    dropIncomplete: readBoolean(data.drop_incomplete, "drop_incomplete") ?? base.dropIncomplete,
    branchQuestionId: readString(data.branch_question_id, "branch_question_id") ?? base.branchQuestionId,
    baseQuestionNumbers: readQuestionNumbers(data.base_question_numbers) ?? base.baseQuestionNumbers,
    selectionLookup: readLookup(data.selection_lookup) ?? base.selectionLookup,
    scaleFootnote: readString(data.scale_footnote, "scale_footnote") ?? base.scaleFootnote,
  };
}

/**
 * Apply REPORT_* environment overrides.
 */
export function applyEnvOverrides(config: ReportConfig, env: NodeJS.ProcessEnv = process.env): ReportConfig {
  return {
    ...config,
    inputFile: env.REPORT_INPUT_FILE?.trim() || config.inputFile,
    outputDir: env.REPORT_OUTPUT_DIR?.trim() || config.outputDir,
    window: {
      start: env.REPORT_WINDOW_START?.trim() || config.window.start,
      end: env.REPORT_WINDOW_END?.trim() || config.window.end,
    },
    dropIncomplete: readBoolean(env.REPORT_DROP_INCOMPLETE, "REPORT_DROP_INCOMPLETE") ?? config.dropIncomplete,
  };
}

/**
 * Check window bounds parse and are ordered. Returns the config unchanged.
 */
export function assertValidWindow(config: ReportConfig): ReportConfig {
  const startMs = toTimestamp(config.window.start);
  const endMs = toTimestamp(config.window.end);
  if (startMs === undefined) throw configError(`window start is not a valid timestamp: ${config.window.start}`);
  if (endMs === undefined) throw configError(`window end is not a valid timestamp: ${config.window.end}`);
  if (startMs > endMs) {
    throw configError(`window start ${config.window.start} is after end ${config.window.end}`);
  }
  return config;
}

export type LoadReportConfigOptions = {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
};

/**
 * Load report.yml (explicit path first, then repo root and cwd), apply env overrides and validate.
 */
export function loadReportConfig(options: LoadReportConfigOptions = {}): ReportConfig {
  const possiblePaths = options.configPath
    ? [options.configPath]
    : [path.join(moduleDir, "..", "report.yml"), path.join(process.cwd(), "report.yml")];

  let config: ReportConfig | null = null;
  for (const configPath of possiblePaths) {
    if (!fs.existsSync(configPath)) continue;
    const content = fs.readFileSync(configPath, "utf8");
    config = parseReportConfig(yaml.load(content));
    console.log(`✅ Loaded report config from: ${configPath}`);
    break;
  }

  if (!config) {
    if (options.configPath) throw configError(`config file not found: ${options.configPath}`);
    console.warn("⚠️ Could not find report.yml, using built-in defaults");
    config = DEFAULT_REPORT_CONFIG;
  }

  return assertValidWindow(applyEnvOverrides(config, options.env ?? process.env));
}
