import type { SurveyField, SurveyRecord } from "./surveyTypes";

export type WindowBound = Date | string | number;

/**
 * Parse a timestamp cell or bound to epoch milliseconds.
 * "YYYY-MM-DD HH:MM:SS" export values are read as UTC.
 */
export function toTimestamp(input: unknown): number | undefined {
  if (input instanceof Date) {
    const ms = input.getTime();
    return Number.isNaN(ms) ? undefined : ms;
  }
  if (typeof input === "number" && Number.isFinite(input)) return input;
  if (typeof input === "string") {
    const trimmed = input.trim();
    if (!trimmed) return undefined;
    const isoLike = /^\d{4}-\d{2}-\d{2}[ T]\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/.test(trimmed)
      ? `${trimmed.replace(" ", "T")}Z`
      : trimmed;
    const ms = Date.parse(isoLike);
    if (!Number.isNaN(ms)) return ms;
  }
  return undefined;
}

/**
 * Subset records to those whose timestamp lies within [start, end], both bounds inclusive.
 * Records with a missing or unparseable timestamp are excluded. An empty result is returned as-is.
 */
export function filterResponsesByWindow(
  records: readonly SurveyRecord[],
  start: WindowBound,
  end: WindowBound,
  timestampField: SurveyField = "completed_at"
): SurveyRecord[] {
  const startMs = toTimestamp(start);
  const endMs = toTimestamp(end);
  if (startMs === undefined || endMs === undefined) {
    throw new Error(`[report-window] invalid window bounds: start=${String(start)}, end=${String(end)}`);
  }

  return records.filter((record) => {
    const ms = toTimestamp(record[timestampField]);
    return ms !== undefined && ms >= startMs && ms <= endMs;
  });
}
