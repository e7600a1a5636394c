/**
 * Normalize Survey Export Data
 *
 * Maps raw export columns to canonical field names using mappings/survey_columns.yml,
 * then applies the cleaning steps the report body relies on (numbering repair,
 * text cleanup). Downstream code only ever sees canonical SurveyRecord fields.
 */

import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import yaml from "js-yaml";
import { stripTags } from "./sanitizeLatex";
import { SURVEY_FIELDS, type RawCell, type RawSurveyTable, type SurveyField, type SurveyRecord } from "./surveyTypes";

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

export type SurveyColumnMapping = {
  expected_column_count: number;
  drop_columns: string[];
  strip_prefix: string;
  canonical_fields: Record<SurveyField, { candidates: string[] }>;
};

const FALLBACK_MAPPING: SurveyColumnMapping = {
  expected_column_count: 14,
  drop_columns: ["pdf_loop", "responseid"],
  strip_prefix: "pdf_export_",
  canonical_fields: {
    respondent_id: { candidates: ["respid", "respondent_id"] },
    first_name: { candidates: ["first_name"] },
    last_name: { candidates: ["last_name"] },
    title: { candidates: ["title"] },
    customer: { candidates: ["customer"] },
    country: { candidates: ["country"] },
    completed_at: { candidates: ["complete_datetime", "completed_at"] },
    question_id: { candidates: ["qid", "question_id"] },
    sub_item_index: { candidates: ["sub_qid", "sub_item_index"] },
    question_stem_text: { candidates: ["main_q_text", "question_stem_text"] },
    sub_item_text: { candidates: ["sub_q_text", "sub_item_text"] },
    response_value: { candidates: ["response", "response_value"] },
  },
};

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed survey_columns.yml document. Returns null when the shape is wrong.
 */
export function parseColumnMapping(data: unknown): SurveyColumnMapping | null {
  if (!isRecord(data)) return null;
  const { expected_column_count, drop_columns, strip_prefix, canonical_fields } = data;
  if (typeof expected_column_count !== "number") return null;
  if (!isStringArray(drop_columns) || typeof strip_prefix !== "string") return null;
  if (!isRecord(canonical_fields)) return null;

  const fields: Partial<Record<SurveyField, { candidates: string[] }>> = {};
  for (const field of SURVEY_FIELDS) {
    const entry = canonical_fields[field];
    if (!isRecord(entry) || !isStringArray(entry.candidates)) return null;
    fields[field] = { candidates: entry.candidates };
  }

  return {
    expected_column_count,
    drop_columns,
    strip_prefix,
    canonical_fields: { ...FALLBACK_MAPPING.canonical_fields, ...fields },
  };
}

// Cache for mappings
let mappingCache: SurveyColumnMapping | null = null;

/**
 * Load survey_columns.yml mappings
 */
export function loadColumnMapping(): SurveyColumnMapping {
  if (mappingCache) {
    return mappingCache;
  }

  const possiblePaths = [
    path.join(moduleDir, "..", "mappings", "survey_columns.yml"),
    path.join(process.cwd(), "mappings", "survey_columns.yml"),
  ];

  for (const mappingPath of possiblePaths) {
    try {
      if (fs.existsSync(mappingPath)) {
        const content = fs.readFileSync(mappingPath, "utf8");
        const mapping = parseColumnMapping(yaml.load(content));
        if (mapping) {
          console.log(`✅ Loaded survey column mappings from: ${mappingPath}`);
          mappingCache = mapping;
          return mappingCache;
        }
        console.warn(`⚠️ Ignoring malformed survey column mappings at ${mappingPath}`);
      }
    } catch (e) {
      console.warn(`Failed to load mappings from ${mappingPath}:`, e);
      continue;
    }
  }

  console.warn("⚠️ Could not load survey_columns.yml, using built-in mappings");
  mappingCache = FALLBACK_MAPPING;
  return mappingCache;
}

export type CleanSurveyOptions = {
  /** Drop records missing last_name, first_name, country, customer or title. Default false. */
  dropIncomplete?: boolean;
  mapping?: SurveyColumnMapping;
};

const RESPONDENT_FIELDS = ["last_name", "first_name", "country", "customer", "title"] as const;

function resolveColumns(renamed: string[], mapping: SurveyColumnMapping): Map<SurveyField, string> {
  const resolved = new Map<SurveyField, string>();
  const missing: SurveyField[] = [];
  for (const field of SURVEY_FIELDS) {
    const column = mapping.canonical_fields[field].candidates.find((c) => renamed.includes(c));
    if (column === undefined) missing.push(field);
    else resolved.set(field, column);
  }
  if (missing.length > 0) {
    throw new Error(`[survey-schema] raw data is missing columns for: ${missing.join(", ")}`);
  }
  return resolved;
}

function parseIndex(cell: RawCell): number {
  if (cell == null) return 1;
  const n = Number.parseInt(cell, 10);
  return Number.isFinite(n) ? n : 1;
}

function cleanResponse(value: RawCell): string | null {
  if (value == null) return null;
  return value.replace(/^, and/, "").trim();
}

/**
 * Renumber sub_item_index as 1..N within each question_id.
 * Groups come out in order of first appearance; rows keep their order inside a group.
 */
export function renumberSubItems(records: readonly SurveyRecord[]): SurveyRecord[] {
  const groups = new Map<string, SurveyRecord[]>();
  for (const record of records) {
    const group = groups.get(record.question_id);
    if (group) group.push(record);
    else groups.set(record.question_id, [record]);
  }
  return [...groups.values()].flatMap((group) =>
    group.map((record, i) => ({ ...record, sub_item_index: i + 1 }))
  );
}

/**
 * Clean a raw survey export into canonical records.
 *
 * @throws Error tagged [survey-schema] when the column count is not the expected 14
 *   or a mapped column is missing
 */
export function cleanSurveyData(raw: RawSurveyTable, options: CleanSurveyOptions = {}): SurveyRecord[] {
  const mapping = options.mapping ?? loadColumnMapping();

  const cols = raw.columns.length;
  if (cols !== mapping.expected_column_count) {
    throw new Error(`[survey-schema] raw data has ${cols} columns, expected ${mapping.expected_column_count}`);
  }

  // Drop bookkeeping columns, strip the export prefix from the rest
  const kept = raw.columns.filter((c) => !mapping.drop_columns.includes(c));
  const renamedToSource = new Map<string, string>();
  for (const column of kept) {
    const renamed = column.startsWith(mapping.strip_prefix) ? column.slice(mapping.strip_prefix.length) : column;
    renamedToSource.set(renamed, column);
  }
  const resolved = resolveColumns([...renamedToSource.keys()], mapping);
  const cell = (row: Record<string, RawCell>, field: SurveyField): RawCell => {
    const renamed = resolved.get(field);
    const source = renamed === undefined ? undefined : renamedToSource.get(renamed);
    return source === undefined ? null : row[source] ?? null;
  };

  const records: SurveyRecord[] = raw.rows.map((row) => ({
    respondent_id: cell(row, "respondent_id") ?? "",
    first_name: cell(row, "first_name"),
    last_name: cell(row, "last_name"),
    title: cell(row, "title"),
    customer: cell(row, "customer"),
    country: cell(row, "country"),
    completed_at: cell(row, "completed_at"),
    question_id: cell(row, "question_id") ?? "",
    sub_item_index: parseIndex(cell(row, "sub_item_index")),
    question_stem_text: cell(row, "question_stem_text"),
    sub_item_text: cell(row, "sub_item_text"),
    response_value: cleanResponse(cell(row, "response_value")),
  }));

  let out = renumberSubItems(records).map((record) => ({
    ...record,
    customer: record.customer == null ? null : record.customer.replace(/&/g, "and"),
    sub_item_text: record.sub_item_text == null ? null : stripTags(record.sub_item_text.replace(/’/g, "'")),
    question_stem_text: record.question_stem_text == null ? null : stripTags(record.question_stem_text),
  }));

  if (options.dropIncomplete) {
    out = out.filter((record) => RESPONDENT_FIELDS.every((field) => record[field] != null));
  }

  return out.map((record) => Object.freeze(record));
}
