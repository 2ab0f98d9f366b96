/**
 * Bank Format Detector
 *
 * Walks the priority-ordered format table; the first entry with any
 * matching pattern wins. Regional banks sit ahead of the national ones
 * because a national bank's name routinely shows up inside a regional
 * statement (card autopay lines, wire counterparties).
 *
 * Pure function: never throws. No match is the expected "generic" outcome.
 */

import type { UnderwritingConfig } from "@/lib/config";
import type { BankFormat, BankFormatId } from "@/lib/statementModel/types";

export function detectBankFormat(text: string, config: UnderwritingConfig): BankFormat {
  for (const rule of config.bankFormats) {
    const matched = rule.patterns.filter((p) => p.regex.test(text)).map((p) => p.source);
    if (matched.length > 0) {
      return { id: rule.id, matchedPatterns: matched };
    }
  }
  return { id: "generic", matchedPatterns: [] };
}

/**
 * Every format whose patterns match, in table order. Used for the
 * ambiguous-format diagnostic when more than one institution is named.
 */
export function matchingBankFormats(text: string, config: UnderwritingConfig): BankFormatId[] {
  return config.bankFormats.filter((rule) => rule.patterns.some((p) => p.regex.test(text))).map((rule) => rule.id);
}
