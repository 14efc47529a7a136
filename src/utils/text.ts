export function normalizeText(text: string): string {
  return text.replace(/\r\n?/g, "\n").replace(/\t/g, " ").trim();
}

/**
 * Canonical form of a document body. Case is preserved; only whitespace is
 * rewritten, so identical prose extracted with different spacing collapses
 * to the same string.
 */
export function normalizeWhitespace(text: string): string {
  return normalizeText(text)
    .replace(/[\u00a0\u1680\u2000-\u200a\u202f\u205f\u3000\f\v]/g, " ")
    .split("\n")
    .map((line) => line.replace(/ {2,}/g, " ").trim())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}
