const CITATION_MARKER = /\[[\d,\s\-–]+\]/g;

/**
 * Normalizes extracted prose: single spaces, no bracketed numeric citations
 * such as `[1]`, `[2, 3]` or `[4-6]`, no runs of periods and no space before
 * punctuation.
 */
export function cleanText(text: string): string {
  if (!text) {
    return "";
  }

  return text
    .replace(/\s+/g, " ")
    .replace(CITATION_MARKER, "")
    .replace(/\.{2,}/g, ".")
    .replace(/ {2,}/g, " ")
    .replace(/\s+([.,;:!?])/g, "$1")
    .trim();
}
