/**
 * Scrubber: Transfers & Categories
 *
 * Transfer: transfer vocabulary AND no revenue-source keyword (revenue wins).
 * A debit naming a known lender (tier 1/2) is a repayment, never a transfer.
 * Category: first matching ordered rule whose direction fits; default "other".
 *
 * The debt-service rule asks the lender matcher. Structural (tier 3)
 * matches only count once their label repeats enough times in the
 * statement, so callers pass the qualifying labels in.
 */

import type { CategoryRule, CategoryTables, UnderwritingConfig } from "@/lib/config/types";
import { matchLender } from "@/lib/lenders/matchLender";
import type { Transaction, TransactionCategory } from "@/lib/statementModel/types";

export function isInternalTransfer(description: string, tables: CategoryTables): boolean {
  if (!tables.transferVocabulary.some((p) => p.test(description))) return false;
  return !tables.revenueKeywords.some((p) => p.test(description));
}

/** Transfer flag for a whole transaction; lender repayments ride transfer rails too. */
export function isTransfer(txn: Transaction, config: UnderwritingConfig): boolean {
  if (!isInternalTransfer(txn.description, config.categories)) return false;
  if (txn.amount >= 0) return true;
  return matchLender(txn.description, config.lenders, { structural: false }) === null;
}

function directionFits(rule: CategoryRule, amount: number): boolean {
  if (rule.direction === "any") return true;
  return rule.direction === "credit" ? amount > 0 : amount < 0;
}

function keywordHit(rule: CategoryRule, description: string, tables: CategoryTables): boolean {
  if (rule.patterns.some((p) => p.test(description))) return true;
  return rule.includeRevenueKeywords && tables.revenueKeywords.some((p) => p.test(description));
}

/**
 * Category from every rule before the debt-service rule, or null when the
 * transaction would reach it. Used to count structural lender labels.
 */
export function categoryBeforeLenderRule(txn: Transaction, tables: CategoryTables): TransactionCategory | null {
  for (const rule of tables.rules) {
    if (rule.includeLenderPatterns) return null;
    if (directionFits(rule, txn.amount) && keywordHit(rule, txn.description, tables)) return rule.category;
  }
  return null;
}

/**
 * Structural lender labels that repeat at least `structuralMinOccurrences`
 * times among debits that reach the debt-service rule.
 */
export function qualifyingStructuralLabels(
  transactions: readonly Transaction[],
  config: UnderwritingConfig,
): Set<string> {
  const counts = new Map<string, number>();
  for (const txn of transactions) {
    if (txn.amount >= 0) continue;
    if (isTransfer(txn, config)) continue;
    if (categoryBeforeLenderRule(txn, config.categories) !== null) continue;
    const match = matchLender(txn.description, config.lenders);
    if (match?.tier === 3) counts.set(match.lender, (counts.get(match.lender) ?? 0) + 1);
  }
  const min = config.policy.positions.structuralMinOccurrences;
  return new Set([...counts].filter(([, n]) => n >= min).map(([label]) => label));
}

export function categorize(
  txn: Transaction,
  config: UnderwritingConfig,
  structuralLabels: ReadonlySet<string>,
): TransactionCategory {
  const tables = config.categories;
  if (isTransfer(txn, config)) return "transfer";

  for (const rule of tables.rules) {
    if (!directionFits(rule, txn.amount)) continue;
    if (keywordHit(rule, txn.description, tables)) return rule.category;
    if (rule.includeLenderPatterns) {
      const match = matchLender(txn.description, config.lenders);
      if (match && (match.tier < 3 || structuralLabels.has(match.lender))) return rule.category;
    }
  }
  return "other";
}
