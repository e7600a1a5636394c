/**
 * LaTeX Text Sanitization Helper
 *
 * Makes survey free text safe for embedding in the Quarto/LaTeX report body.
 * Handles HTML tag removal (survey platforms export question text with markup)
 * and escaping of LaTeX reserved characters.
 */

export type SanitizeInput = string | null | undefined;

const TAG_PATTERN = /<.*?>/g;

function isList(input: SanitizeInput | readonly SanitizeInput[]): input is readonly SanitizeInput[] {
  return Array.isArray(input);
}

/**
 * Remove all `<...>` tags from a string (non-greedy, no nesting awareness).
 */
export function stripTags(input: SanitizeInput): string;
export function stripTags(input: readonly SanitizeInput[]): string[];
export function stripTags(input: SanitizeInput | readonly SanitizeInput[]): string | string[] {
  if (isList(input)) {
    return input.map((item: SanitizeInput) => stripTags(item));
  }
  if (input == null) return "";
  return input.replace(TAG_PATTERN, "");
}

/**
 * Escape LaTeX special characters (regex-based)
 *
 * Rules, applied in order:
 * - Backslash -> \textbackslash{}
 * - # $ % & _ { } -> prefixed with a backslash (this also escapes the braces
 *   introduced by the first rule, so a source backslash becomes \textbackslash\{\})
 * - ~ -> \textasciitilde{}, ^ -> \textasciicircum{}
 *
 * Not idempotent: escaping already escaped text escapes its backslashes again.
 */
export function escapeLatex(input: SanitizeInput): string;
export function escapeLatex(input: readonly SanitizeInput[]): string[];
export function escapeLatex(input: SanitizeInput | readonly SanitizeInput[]): string | string[] {
  if (isList(input)) {
    return input.map((item: SanitizeInput) => escapeLatex(item));
  }
  if (input == null) return "";

  let escaped = input;

  // 1. Literal backslash first
  escaped = escaped.replace(/\\/g, "\\textbackslash{}");

  // 2. Standard specials (braces included)
  escaped = escaped.replace(/([#$%&_{}])/g, "\\$1");

  // 3. Tilde and caret have no single-character escape
  escaped = escaped.replace(/~/g, "\\textasciitilde{}");
  escaped = escaped.replace(/\^/g, "\\textasciicircum{}");

  return escaped;
}

/** Sequential literal replacements; order matches escapeLatex. */
const INLINE_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
  ["\\", "\\textbackslash{}"],
  ["&", "\\&"],
  ["%", "\\%"],
  ["$", "\\$"],
  ["#", "\\#"],
  ["_", "\\_"],
  ["{", "\\{"],
  ["}", "\\}"],
  ["~", "\\textasciitilde{}"],
  ["^", "\\textasciicircum{}"],
];

/**
 * Escape LaTeX special characters with a fixed (non-regex) mapping.
 * Produces the same output as escapeLatex.
 */
export function escapeLatexInline(input: SanitizeInput): string;
export function escapeLatexInline(input: readonly SanitizeInput[]): string[];
export function escapeLatexInline(input: SanitizeInput | readonly SanitizeInput[]): string | string[] {
  if (isList(input)) {
    return input.map((item: SanitizeInput) => escapeLatexInline(item));
  }
  if (input == null) return "";
  return INLINE_REPLACEMENTS.reduce(
    (text, [special, replacement]) => text.split(special).join(replacement),
    input
  );
}
