/**
 * LaTeX score table for a multi-part question.
 *
 * Two columns (item text, score) with booktabs rules and a light gray separator
 * between items. Expects booktabs and xcolor in the document preamble.
 *
 * Inputs are embedded as given: callers escape labels and responses first.
 */

const TABLE_HEADER = [
  "\\begin{tabular}{p{0.6\\linewidth} p{0.2\\linewidth}}",
  "\\toprule",
  "\\textbf{Item} & \\textbf{Score} \\\\ \\midrule",
].join("\n");

const TABLE_FOOTER = "\\bottomrule\n\\end{tabular}";

export const ROW_SEPARATOR = "\\arrayrulecolor[gray]{0.8}\\hline\\arrayrulecolor{black}";

function renderRow(label: string, score: string): string {
  return `\\addlinespace[0.2cm]\n${label} & ${score} \\\\ \\addlinespace[0.2cm]`;
}

export function createScoreTable(responses: readonly string[], labels: readonly string[]): string {
  if (responses.length !== labels.length) {
    throw new Error(
      `[latex-table] responses (${responses.length}) and labels (${labels.length}) must be the same length`
    );
  }
  if (responses.length === 0) {
    throw new Error("[latex-table] cannot build a table with zero rows");
  }

  const lastIndex = responses.length - 1;
  const rows = labels.map((label, i) => {
    const row = renderRow(label, responses[i]);
    return i < lastIndex ? `${row}\n${ROW_SEPARATOR}` : row;
  });

  return [TABLE_HEADER, ...rows, TABLE_FOOTER].join("\n");
}
