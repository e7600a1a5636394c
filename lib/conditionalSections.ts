/**
 * Conditional evaluation sections
 *
 * The branch question (q3 by default) asks which product lines the respondent works
 * with. Each selection maps to a letter code through the selection lookup, and the
 * code picks the dependent question block for that product line (q5a..q10a for "a").
 *
 * Pipeline: branch responses → parseBranchSelections → resolveSelectionCodes →
 * keepCodesWithQuestions → one section per code.
 */

import { escapeLatex } from "./sanitizeLatex";
import { createScoreTable } from "./latexTable";
import {
  getQuestionStem,
  getResponses,
  getSubItemLabels,
  listQuestionIds,
  type DuplicateStemHandler,
} from "./questionAccessors";
import type { SelectionLookupEntry, SurveyRecord } from "./surveyTypes";
import { DEFAULT_SELECTION_LOOKUP } from "./reportConfig";

export type ConditionalSectionOptions = {
  branchQuestionId?: string;
  selectionLookup?: readonly SelectionLookupEntry[];
  baseQuestionNumbers?: readonly number[];
  scaleFootnote?: string;
  onDuplicateStem?: DuplicateStemHandler;
};

export type RenderedSection = {
  code: string;
  selection: string;
  /** Dependent questions that produced a table, in base-number order. */
  questionIds: string[];
};

export type ConditionalSectionsResult = {
  markdown: string;
  sections: RenderedSection[];
};

const DEFAULT_BASE_QUESTION_NUMBERS = [5, 6, 7, 8, 9, 10];
const DEFAULT_SCALE_FOOTNOTE = "5-point scale: 1=Strongly Disagree; 5=Strongly Agree";

export const SECTION_RULE = "\\vspace{-1em}\\hrule\\vspace{0.5em}";

const PARENTHETICAL = /\s*\([^()]*\)/g;

/**
 * Split an escaped branch answer into selection labels.
 *
 * Order matters: parentheticals go first since they may contain commas, then the
 * first "and", then doubled whitespace, then ", " becomes the ";" delimiter.
 */
export function parseBranchSelections(escapedAnswer: string): string[] {
  const cleaned = escapedAnswer
    .replace(PARENTHETICAL, "")
    .replace(PARENTHETICAL, "") // second pass clears one level of nesting
    .replace(/\band\b/, "")
    .replace(/\s{2,}/g, " ")
    .replace(/, /g, ";");

  return cleaned
    .split(";")
    .map((label) => label.trim())
    .filter((label) => label.length > 0);
}

/**
 * Map selection labels to lookup codes. Codes come back in lookup-table order;
 * labels with no lookup entry are dropped.
 */
export function resolveSelectionCodes(
  labels: readonly string[],
  lookup: readonly SelectionLookupEntry[]
): SelectionLookupEntry[] {
  const selected = new Set(labels);
  return lookup.filter((entry) => selected.has(escapeLatex(entry.selection)));
}

export function dependentQuestionIds(code: string, baseQuestionNumbers: readonly number[]): string[] {
  return baseQuestionNumbers.map((n) => `q${n}${code}`);
}

/**
 * Drop lookup entries for which the data holds none of the dependent questions
 * (skipped block or a schema mismatch).
 */
export function keepCodesWithQuestions(
  entries: readonly SelectionLookupEntry[],
  data: readonly SurveyRecord[],
  baseQuestionNumbers: readonly number[]
): SelectionLookupEntry[] {
  const present = new Set(listQuestionIds(data));
  return entries.filter((entry) =>
    dependentQuestionIds(entry.code, baseQuestionNumbers).some((qid) => present.has(qid))
  );
}

/**
 * Build the evaluation sections for one respondent's data.
 * A branch answer that matches no selection yields an empty result, and a selected
 * block the respondent skipped entirely is left out.
 */
export function buildConditionalSections(
  data: readonly SurveyRecord[],
  options: ConditionalSectionOptions = {}
): ConditionalSectionsResult {
  const branchQuestionId = options.branchQuestionId ?? "q3";
  const lookup = options.selectionLookup ?? DEFAULT_SELECTION_LOOKUP;
  const baseNumbers = options.baseQuestionNumbers ?? DEFAULT_BASE_QUESTION_NUMBERS;
  const footnote = options.scaleFootnote ?? DEFAULT_SCALE_FOOTNOTE;

  const branchAnswers = escapeLatex(getResponses(data, branchQuestionId));
  const labels = branchAnswers.flatMap((answer) => parseBranchSelections(answer));
  const entries = keepCodesWithQuestions(resolveSelectionCodes(labels, lookup), data, baseNumbers);

  const parts: string[] = [];
  const sections: RenderedSection[] = [];

  for (const entry of entries) {
    parts.push(`# Evaluation of ${escapeLatex(entry.selection)}\n${SECTION_RULE}\n`);
    const rendered: string[] = [];

    for (const qid of dependentQuestionIds(entry.code, baseNumbers)) {
      const stem = escapeLatex(getQuestionStem(data, qid, options.onDuplicateStem));
      const responses = escapeLatex(getResponses(data, qid));
      const subItems = escapeLatex(getSubItemLabels(data, qid));

      if (!stem && responses.length === 0 && subItems.length === 0) continue;

      parts.push(`## **${qid}.** ${stem}\n`);
      parts.push(createScoreTable(responses, subItems));
      parts.push(`\\scriptsize ${footnote}\\normalsize\n\n`);
      rendered.push(qid);
    }

    sections.push({ code: entry.code, selection: entry.selection, questionIds: rendered });
  }

  return { markdown: parts.join("\n"), sections };
}
