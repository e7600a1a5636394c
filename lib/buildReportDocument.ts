/**
 * Build one respondent's Quarto report document.
 *
 * Document = front matter (output file name + params) + report template, with the
 * template's {{SLOT}} placeholders filled from the respondent's data:
 * - RESPONDENT_INTRO: who the report is for and what they selected
 * - EVALUATION_SECTIONS: conditional sections with score tables
 *
 * Every dataset string is escaped exactly once, here or in buildConditionalSections.
 */

import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import yaml from "js-yaml";
import { escapeLatex } from "./sanitizeLatex";
import { buildConditionalSections, type RenderedSection } from "./conditionalSections";
import { artifactName, getRespondentInfo, respondentSlice } from "./respondents";
import { DEFAULT_REPORT_CONFIG, type ReportConfig } from "./reportConfig";
import type { DuplicateStemHandler } from "./questionAccessors";
import type { RespondentInfo, SurveyRecord } from "./surveyTypes";

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

const FALLBACK_TEMPLATE = "{{RESPONDENT_INTRO}}\n\n{{EVALUATION_SECTIONS}}\n";

export type ReportSlots = {
  RESPONDENT_INTRO: string;
  EVALUATION_SECTIONS: string;
  [key: string]: string;
};

export type ReportDocument = {
  info: RespondentInfo;
  /** File name for the generated .qmd */
  fileName: string;
  /** PDF name the renderer writes, from the front matter */
  outputFile: string;
  content: string;
  sections: RenderedSection[];
};

export type BuildReportDocumentParams = {
  /** Normalized, window-filtered working set (all respondents). */
  data: readonly SurveyRecord[];
  respondentId: string;
  template?: string;
  config?: ReportConfig;
  onDuplicateStem?: DuplicateStemHandler;
};

/**
 * Load the report template, falling back to bare slots when the file is missing.
 */
export function loadReportTemplate(templateFile: string): string {
  const possiblePaths = path.isAbsolute(templateFile)
    ? [templateFile]
    : [path.join(process.cwd(), templateFile), path.join(moduleDir, "..", templateFile)];

  for (const filePath of possiblePaths) {
    if (fs.existsSync(filePath)) {
      console.log(`✅ Loaded report template from: ${filePath}`);
      return fs.readFileSync(filePath, "utf-8");
    }
  }

  console.warn(`⚠️ ${templateFile} not found, using bare slot template`);
  return FALLBACK_TEMPLATE;
}

/**
 * Replace {{KEY}} placeholders. Unknown keys render empty and are logged.
 * Values are inserted literally (LaTeX escapes such as \$ survive).
 */
export function renderTemplate(template: string, slots: ReportSlots): string {
  return template.replace(/\{\{([A-Z0-9_]+)\}\}/g, (_match, key: string) => {
    const value = slots[key];
    if (value === undefined) {
      console.warn(`[report-template] no value for placeholder {{${key}}}`);
      return "";
    }
    return value;
  });
}

export function buildFrontMatter(info: RespondentInfo): string {
  const header = yaml.dump(
    {
      "output-file": `${artifactName(info)}.pdf`,
      params: { respid: info.respondent_id },
    },
    { lineWidth: -1 }
  );
  return `---\n${header}---`;
}

function firstField(rows: readonly SurveyRecord[], field: "title" | "country" | "completed_at"): string | null {
  return rows.find((row) => row[field] != null)?.[field] ?? null;
}

export function buildRespondentIntro(
  rows: readonly SurveyRecord[],
  info: RespondentInfo,
  sections: readonly RenderedSection[]
): string {
  const lines = [
    "# Respondent Overview",
    "",
    `**Name:** ${escapeLatex(`${info.first_name} ${info.last_name}`.trim())}  `,
    `**Title:** ${escapeLatex(firstField(rows, "title"))}  `,
    `**Organization:** ${escapeLatex(info.customer)}  `,
    `**Country:** ${escapeLatex(firstField(rows, "country"))}  `,
    `**Survey completed:** ${escapeLatex(firstField(rows, "completed_at"))}`,
    "",
  ];

  if (sections.length > 0) {
    lines.push(`Product lines evaluated: ${sections.map((s) => escapeLatex(s.selection)).join("; ")}.`);
  } else {
    lines.push("No product line evaluations were recorded for this respondent.");
  }

  return lines.join("\n");
}

export function buildReportDocument(params: BuildReportDocumentParams): ReportDocument {
  const config = params.config ?? DEFAULT_REPORT_CONFIG;
  const rows = respondentSlice(params.data, params.respondentId);
  const info = getRespondentInfo(params.data, params.respondentId);

  const { markdown, sections } = buildConditionalSections(rows, {
    branchQuestionId: config.branchQuestionId,
    selectionLookup: config.selectionLookup,
    baseQuestionNumbers: config.baseQuestionNumbers,
    scaleFootnote: config.scaleFootnote,
    onDuplicateStem: params.onDuplicateStem,
  });

  const body = renderTemplate(params.template ?? FALLBACK_TEMPLATE, {
    RESPONDENT_INTRO: buildRespondentIntro(rows, info, sections),
    EVALUATION_SECTIONS: markdown,
  });

  return {
    info,
    fileName: `report_${params.respondentId}.qmd`,
    outputFile: `${artifactName(info)}.pdf`,
    content: `${buildFrontMatter(info)}\n\n${body}`,
    sections,
  };
}
