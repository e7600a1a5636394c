import type { RawCell, RawSurveyTable, SurveyRecord } from "../../lib/surveyTypes";

export const RAW_COLUMNS = [
  "pdf_loop",
  "responseid",
  "respid",
  "pdf_export_first_name",
  "pdf_export_last_name",
  "pdf_export_title",
  "pdf_export_customer",
  "pdf_export_country",
  "complete_datetime",
  "qid",
  "sub_qid",
  "main_q_text",
  "sub_q_text",
  "response",
];

export function makeRawRow(overrides: Record<string, RawCell> = {}): Record<string, RawCell> {
  return {
    pdf_loop: "1",
    responseid: "9001",
    respid: "r1",
    pdf_export_first_name: "Ann",
    pdf_export_last_name: "Lee",
    pdf_export_title: "Director",
    pdf_export_customer: "Acme",
    pdf_export_country: "Canada",
    complete_datetime: "2025-06-01 10:00:00",
    qid: "q1",
    sub_qid: "1",
    main_q_text: "Stem",
    sub_q_text: "Item",
    response: "3",
    ...overrides,
  };
}

export function makeRawTable(rows: Array<Record<string, RawCell>>, columns: string[] = RAW_COLUMNS): RawSurveyTable {
  return { columns, rows };
}

export function makeRecord(overrides: Partial<SurveyRecord> = {}): SurveyRecord {
  return {
    respondent_id: "r1",
    first_name: "Ann",
    last_name: "Lee",
    title: "Director",
    customer: "Acme",
    country: "Canada",
    completed_at: "2025-06-01 10:00:00",
    question_id: "q1",
    sub_item_index: 1,
    question_stem_text: "Stem",
    sub_item_text: "Item",
    response_value: "3",
    ...overrides,
  };
}
