/**
 * Survey export data structures shared by the report pipeline.
 */

export type RawCell = string | null;

/** Tab-delimited export as parsed, before normalization. */
export type RawSurveyTable = {
  columns: string[];
  rows: Array<Record<string, RawCell>>;
};

/** One row per respondent x question x sub-item, after normalization. */
export type SurveyRecord = {
  respondent_id: string;
  first_name: string | null;
  last_name: string | null;
  title: string | null;
  customer: string | null;
  country: string | null;
  completed_at: string | null;
  question_id: string;
  sub_item_index: number;
  question_stem_text: string | null;
  sub_item_text: string | null;
  response_value: string | null;
};

export type SurveyField = keyof SurveyRecord;

export const SURVEY_FIELDS = [
  "respondent_id",
  "first_name",
  "last_name",
  "title",
  "customer",
  "country",
  "completed_at",
  "question_id",
  "sub_item_index",
  "question_stem_text",
  "sub_item_text",
  "response_value",
] as const satisfies readonly SurveyField[];

/** Ordered selection label -> code mapping used to build dependent question ids. */
export type SelectionLookupEntry = {
  selection: string;
  code: string;
};

export type RespondentInfo = {
  respondent_id: string;
  first_name: string;
  last_name: string;
  customer: string;
};
