import type { RespondentInfo, SurveyRecord } from "./surveyTypes";

/** Distinct respondent ids in order of first appearance. */
export function listRespondentIds(data: readonly SurveyRecord[]): string[] {
  return [...new Set(data.map((record) => record.respondent_id))];
}

/** Rows belonging to one respondent, in dataset order. */
export function respondentSlice(data: readonly SurveyRecord[], respondentId: string): SurveyRecord[] {
  return data.filter((record) => record.respondent_id === respondentId);
}

function firstValue(rows: readonly SurveyRecord[], field: "first_name" | "last_name" | "customer"): string {
  for (const row of rows) {
    const value = row[field];
    if (value != null && value.trim()) return value.trim();
  }
  return "";
}

/**
 * Metadata used to name the respondent's artifact.
 * "/" in the customer name becomes "-" so it can sit in a file name.
 */
export function getRespondentInfo(data: readonly SurveyRecord[], respondentId: string): RespondentInfo {
  const rows = respondentSlice(data, respondentId);
  return {
    respondent_id: respondentId,
    first_name: firstValue(rows, "first_name"),
    last_name: firstValue(rows, "last_name"),
    customer: firstValue(rows, "customer").replace(/\//g, "-"),
  };
}

export function artifactName(info: RespondentInfo): string {
  return `Online Results - ${info.customer}, ${info.first_name} ${info.last_name}`;
}
