/**
 * Lender Matching: Tiers 1–3
 *
 * Tier 1: exact identifier (ACH company id etc.)
 * Tier 2: lender name / alias, corporate suffixes ignored, longest alias
 *         first, word-aligned with spaces removed ("ON DECK" = "ONDECK")
 * Tier 3: structural payment patterns with a `lender` capture group
 *
 * Tier 4 (recurring clusters) needs the whole transaction set and lives in
 * the position engine. Occurrence minimums for tier 3 are applied by callers.
 *
 * Pure function: no IO.
 */

import type { LenderTables } from "@/lib/config/types";
import { compactDescription, normalizeDescription, stripCorporateSuffixes } from "./normalize";

export type LenderMatchTier = 1 | 2 | 3;

export type LenderMatch = {
  lender: string;
  tier: LenderMatchTier;
  /** Config pattern or identifier that matched */
  evidence: string;
};

/** Label for structural matches that name no lender. */
export const UNKNOWN_LENDER_LABEL = "Unknown MCA";

export type MatchLenderOptions = {
  /** Set false to stop after tier 2 */
  structural?: boolean;
};

/** True when `compact` equals a run of whole words of `words` joined without spaces. */
function containsWordRun(words: string[], compact: string): boolean {
  for (let i = 0; i < words.length; i++) {
    let acc = "";
    for (let j = i; j < words.length; j++) {
      acc += words[j];
      if (acc === compact) return true;
      if (acc.length >= compact.length) break;
    }
  }
  return false;
}

function labelFromCapture(raw: string | undefined, suffixes: string[]): string {
  if (!raw) return UNKNOWN_LENDER_LABEL;
  const label = stripCorporateSuffixes(normalizeDescription(raw), suffixes);
  return label.length > 0 ? label : UNKNOWN_LENDER_LABEL;
}

export function matchLender(
  description: string,
  tables: LenderTables,
  options: MatchLenderOptions = {},
): LenderMatch | null {
  const compact = compactDescription(description);
  for (const id of tables.identifiers) {
    if (id.compact.length > 0 && compact.includes(id.compact)) {
      return { lender: id.lender, tier: 1, evidence: id.identifier };
    }
  }

  const words = normalizeDescription(description).split(" ").filter((w) => w.length > 0);
  for (const alias of tables.aliases) {
    if (containsWordRun(words, alias.compact)) {
      return { lender: alias.lender, tier: 2, evidence: alias.normalized };
    }
  }

  if (options.structural === false) return null;
  for (const pattern of tables.structuralPatterns) {
    const m = pattern.regex.exec(description);
    if (!m) continue;
    return {
      lender: labelFromCapture(m.groups?.["lender"], tables.corporateSuffixes),
      tier: 3,
      evidence: pattern.source,
    };
  }
  return null;
}
