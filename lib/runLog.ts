/**
 * Structured logging for report runs: one JSON line per event, plus the
 * plain-text summary written next to the generated documents.
 */

export type ReportRunEvent = "report_run" | "respondent_report";

export type ReportRunLogPayload = {
  window_start: string;
  window_end: string;
  respondents: number;
  records: number;
  duration_ms: number;
  result: "success" | "fail";
  output_dir?: string;
  warning_counts?: Record<string, number>;
  error_message?: string;
};

export type RespondentReportLogPayload = {
  respondent_id: string;
  file: string;
  sections: string[];
};

export function logReportRun(payload: ReportRunLogPayload): void {
  console.log(JSON.stringify({ event: "report_run" satisfies ReportRunEvent, ...payload }));
}

export function logRespondentReport(payload: RespondentReportLogPayload): void {
  console.log(JSON.stringify({ event: "respondent_report" satisfies ReportRunEvent, ...payload }));
}

/** Contents of log.txt in the dated output folder. */
export function formatRunSummary(start: string, end: string, respondentCount: number): string {
  return [`Start Date: ${start}`, `End Date: ${end}`, `Number of Respondents: ${respondentCount}`].join("\n");
}
