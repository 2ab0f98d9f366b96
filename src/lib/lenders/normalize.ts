/**
 * Description normalization shared by lender matching and deposit sourcing.
 */

/** Uppercase, punctuation to spaces, whitespace collapsed. */
export function normalizeDescription(text: string): string {
  return text
    .toUpperCase()
    .replace(/[^A-Z0-9&]+/g, " ")
    .trim()
    .replace(/\s+/g, " ");
}

/** Normalized with all spaces removed ("ON DECK" and "ONDECK" compare equal). */
export function compactDescription(text: string): string {
  return normalizeDescription(text).replace(/ /g, "");
}

/** Drop trailing corporate suffixes ("LIBERTAS FUNDING LLC" -> "LIBERTAS FUNDING"). */
export function stripCorporateSuffixes(normalized: string, suffixes: readonly string[]): string {
  const words = normalized.split(" ");
  while (words.length > 1 && suffixes.includes(words[words.length - 1] ?? "")) {
    words.pop();
  }
  return words.join(" ");
}

/**
 * Grouping key for a counterparty: uppercased, digits and punctuation
 * stripped, first three words ("SQUARE INC 240102 SQ" -> "SQUARE INC SQ").
 */
export function sourceKey(description: string): string {
  return description
    .toUpperCase()
    .replace(/[^A-Z\s]+/g, " ")
    .trim()
    .split(/\s+/)
    .slice(0, 3)
    .join(" ");
}
