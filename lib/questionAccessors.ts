/**
 * Per-question extraction from the normalized survey data.
 *
 * Question ids identify a question or a question + branch letter (e.g. "q7c").
 * getResponses and getSubItemLabels filter the same rows, so their results are
 * equal-length and index-aligned, as createScoreTable requires.
 */

import type { SurveyRecord } from "./surveyTypes";

export type DuplicateStemHandler = (qid: string, stems: string[]) => void;

export type DuplicateStem = {
  qid: string;
  stems: string[];
};

function rowsFor(data: readonly SurveyRecord[], qid: string): SurveyRecord[] {
  return data.filter((record) => record.question_id === qid);
}

function distinctStems(rows: readonly SurveyRecord[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    if (row.question_stem_text != null) seen.add(row.question_stem_text);
  }
  return [...seen];
}

/**
 * Get the question stem text for a question id.
 * Returns undefined when no row matches. When the stem is not distinct, the first
 * one encountered wins and the anomaly is logged and passed to onDuplicate.
 */
export function getQuestionStem(
  data: readonly SurveyRecord[],
  qid: string,
  onDuplicate?: DuplicateStemHandler
): string | undefined {
  const stems = distinctStems(rowsFor(data, qid));
  if (stems.length > 1) {
    console.warn(`[question-accessor] ${qid} has ${stems.length} distinct stems, using the first`);
    onDuplicate?.(qid, stems);
  }
  return stems[0];
}

export function getResponses(data: readonly SurveyRecord[], qid: string): Array<string | null> {
  return rowsFor(data, qid).map((record) => record.response_value);
}

export function getSubItemLabels(data: readonly SurveyRecord[], qid: string): Array<string | null> {
  return rowsFor(data, qid).map((record) => record.sub_item_text);
}

/** Distinct question ids in order of first appearance. */
export function listQuestionIds(data: readonly SurveyRecord[]): string[] {
  return [...new Set(data.map((record) => record.question_id))];
}

/** Every question id that carries more than one distinct stem. */
export function findDuplicateStems(data: readonly SurveyRecord[]): DuplicateStem[] {
  const byQid = new Map<string, Set<string>>();
  for (const record of data) {
    if (record.question_stem_text == null) continue;
    const stems = byQid.get(record.question_id) ?? new Set<string>();
    stems.add(record.question_stem_text);
    byQid.set(record.question_id, stems);
  }
  return [...byQid.entries()]
    .filter(([, stems]) => stems.size > 1)
    .map(([qid, stems]) => ({ qid, stems: [...stems] }));
}
