import assert from "node:assert/strict";
import test from "node:test";
import { ROW_SEPARATOR, createScoreTable } from "../lib/latexTable";

function countSeparators(table: string): number {
  return table.split(ROW_SEPARATOR).length - 1;
}

test("a single-row table has no separator rule", () => {
  const table = createScoreTable(["5"], ["Clarity"]);
  assert.equal(
    table,
    [
      "\\begin{tabular}{p{0.6\\linewidth} p{0.2\\linewidth}}",
      "\\toprule",
      "\\textbf{Item} & \\textbf{Score} \\\\ \\midrule",
      "\\addlinespace[0.2cm]",
      "Clarity & 5 \\\\ \\addlinespace[0.2cm]",
      "\\bottomrule",
      "\\end{tabular}",
    ].join("\n")
  );
  assert.equal(countSeparators(table), 0);
});

test("separators sit between rows, never after the last", () => {
  const table = createScoreTable(["4", "2"], ["Ease", "Speed"]);
  assert.equal(
    table,
    [
      "\\begin{tabular}{p{0.6\\linewidth} p{0.2\\linewidth}}",
      "\\toprule",
      "\\textbf{Item} & \\textbf{Score} \\\\ \\midrule",
      "\\addlinespace[0.2cm]",
      "Ease & 4 \\\\ \\addlinespace[0.2cm]",
      "\\arrayrulecolor[gray]{0.8}\\hline\\arrayrulecolor{black}",
      "\\addlinespace[0.2cm]",
      "Speed & 2 \\\\ \\addlinespace[0.2cm]",
      "\\bottomrule",
      "\\end{tabular}",
    ].join("\n")
  );
});

test("N rows produce exactly N-1 separators", () => {
  for (const n of [2, 3, 7]) {
    const labels = Array.from({ length: n }, (_, i) => `Item ${i + 1}`);
    const scores = Array.from({ length: n }, (_, i) => String((i % 5) + 1));
    assert.equal(countSeparators(createScoreTable(scores, labels)), n - 1);
  }
});

test("inputs are embedded without escaping", () => {
  const table = createScoreTable(["5"], ["R\\&D"]);
  assert.ok(table.includes("\nR\\&D & 5 \\\\ \\addlinespace[0.2cm]\n"));
});

test("misaligned or empty inputs are rejected", () => {
  assert.throws(() => createScoreTable(["1", "2"], ["a"]), /\[latex-table\] responses \(2\) and labels \(1\)/);
  assert.throws(() => createScoreTable([], []), /zero rows/);
});
