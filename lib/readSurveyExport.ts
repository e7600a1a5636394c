import fs from "fs";
import Papa from "papaparse";
import type { RawCell, RawSurveyTable } from "./surveyTypes";

/** Cell values the export uses for "no answer". */
const MISSING_MARKERS = new Set(["", "NA"]);

function toCell(value: unknown): RawCell {
  if (value == null) return null;
  const text = String(value);
  return MISSING_MARKERS.has(text) ? null : text;
}

/**
 * Parse tab-delimited survey export text into a raw table.
 * Empty cells and "NA" become null; malformed rows are reported but kept.
 * Double quotes are ordinary text, so a cell opening with `"` stays in its row.
 */
export function parseSurveyExport(text: string): RawSurveyTable {
  const result = Papa.parse<Record<string, unknown>>(text.replace(/^\uFEFF/, ""), {
    header: true,
    delimiter: "\t",
    // Export cells are never quoted; only tabs and newlines delimit them
    quoteChar: "\u0000",
    skipEmptyLines: true,
  });

  for (const err of result.errors.slice(0, 5)) {
    console.warn(`[survey-export] row ${err.row ?? "?"}: ${err.message}`);
  }
  if (result.errors.length > 5) {
    console.warn(`[survey-export] ${result.errors.length - 5} more parse errors not shown`);
  }

  const columns = result.meta.fields ?? [];
  const rows = result.data.map((row) => {
    const out: Record<string, RawCell> = {};
    for (const column of columns) out[column] = toCell(row[column]);
    return out;
  });

  return { columns, rows };
}

export async function readSurveyExport(filePath: string): Promise<RawSurveyTable> {
  const text = await fs.promises.readFile(filePath, "utf8");
  const table = parseSurveyExport(text);
  console.log(`[survey-export] loaded ${table.rows.length} rows x ${table.columns.length} columns from ${filePath}`);
  return table;
}
