import { findDuplicateStems } from "../questionAccessors";
import { listRespondentIds, respondentSlice } from "../respondents";
import type { SurveyRecord } from "../surveyTypes";

export const PREFLIGHT_WARNING_CODE = {
  DUPLICATE_STEM: "DUPLICATE_STEM",
  RESPONDENT_METADATA_MISSING: "RESPONDENT_METADATA_MISSING",
  RESPONDENT_METADATA_INCONSISTENT: "RESPONDENT_METADATA_INCONSISTENT",
  BRANCH_QUESTION_MISSING: "BRANCH_QUESTION_MISSING",
} as const;

export type WarningCode = (typeof PREFLIGHT_WARNING_CODE)[keyof typeof PREFLIGHT_WARNING_CODE];

export type PreflightWarning = {
  code: WarningCode;
  message: string;
  meta?: Record<string, unknown>;
};

export type SurveyPreflightResult = {
  warnings: PreflightWarning[];
  summary: {
    warningCounts: Record<string, number>;
    hasAnyWarning: boolean;
    respondentCount: number;
    recordCount: number;
  };
};

const METADATA_FIELDS = ["first_name", "last_name", "title", "customer", "country"] as const;

/**
 * Fails the run when the reporting window selected nothing.
 */
export function assertWindowNotEmpty(records: readonly SurveyRecord[], start: string, end: string): void {
  if (records.length === 0) {
    throw new Error(`[report-window] no data in selected window (${start} to ${end})`);
  }
}

function respondentWarnings(data: readonly SurveyRecord[], respondentId: string, branchQuestionId: string): PreflightWarning[] {
  const rows = respondentSlice(data, respondentId);
  const warnings: PreflightWarning[] = [];

  const missing = METADATA_FIELDS.filter((field) => rows.every((row) => row[field] == null));
  if (missing.length > 0) {
    warnings.push({
      code: PREFLIGHT_WARNING_CODE.RESPONDENT_METADATA_MISSING,
      message: `Respondent ${respondentId} has no ${missing.join(", ")}`,
      meta: { respondent_id: respondentId, fields: missing },
    });
  }

  const inconsistent = METADATA_FIELDS.filter(
    (field) => new Set(rows.map((row) => row[field]).filter((v) => v != null)).size > 1
  );
  if (inconsistent.length > 0) {
    warnings.push({
      code: PREFLIGHT_WARNING_CODE.RESPONDENT_METADATA_INCONSISTENT,
      message: `Respondent ${respondentId} has more than one value for ${inconsistent.join(", ")}`,
      meta: { respondent_id: respondentId, fields: inconsistent },
    });
  }

  if (!rows.some((row) => row.question_id === branchQuestionId)) {
    warnings.push({
      code: PREFLIGHT_WARNING_CODE.BRANCH_QUESTION_MISSING,
      message: `Respondent ${respondentId} did not answer ${branchQuestionId}; no evaluation sections will be built`,
      meta: { respondent_id: respondentId },
    });
  }

  return warnings;
}

/**
 * Collect data anomalies in the working set. None of these stop the run; they are
 * logged so a bad export is visible before reports go out.
 */
export function assertSurveyInputs(
  data: readonly SurveyRecord[],
  options: { branchQuestionId?: string } = {}
): SurveyPreflightResult {
  const branchQuestionId = options.branchQuestionId ?? "q3";
  const warnings: PreflightWarning[] = [];

  for (const dup of findDuplicateStems(data)) {
    warnings.push({
      code: PREFLIGHT_WARNING_CODE.DUPLICATE_STEM,
      message: `${dup.qid} has ${dup.stems.length} distinct stems; reports use the first`,
      meta: { qid: dup.qid, stems: dup.stems },
    });
  }

  const respondentIds = listRespondentIds(data);
  for (const respondentId of respondentIds) {
    warnings.push(...respondentWarnings(data, respondentId, branchQuestionId));
  }

  const warningCounts: Record<string, number> = {};
  for (const w of warnings) {
    warningCounts[w.code] = (warningCounts[w.code] ?? 0) + 1;
  }

  return {
    warnings,
    summary: {
      warningCounts,
      hasAnyWarning: warnings.length > 0,
      respondentCount: respondentIds.length,
      recordCount: data.length,
    },
  };
}
