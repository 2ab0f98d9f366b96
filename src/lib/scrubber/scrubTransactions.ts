/**
 * Scrubber
 *
 * Classifies every extracted transaction (internal transfer, category),
 * derives daily ending balances over the statement window and summarizes
 * revenue. Output is frozen; the extraction is never modified.
 *
 * Pure function: no IO.
 */

import type { UnderwritingConfig } from "@/lib/config/types";
import { maxDate, minDate } from "@/lib/dates/isoDate";
import type { ScrubbedTransaction, StatementPeriod } from "@/lib/statementModel/types";
import { categorize, isTransfer, qualifyingStructuralLabels } from "./categorize";
import { computeDailyBalances } from "./dailyBalances";
import { computeRevenueMetrics } from "./revenueMetrics";
import type { ScrubInput, ScrubResult } from "./types";

/** Statement period, else the span of transaction dates. */
export function coverageWindow(input: ScrubInput): StatementPeriod | null {
  if (input.period) return input.period;
  const dates = input.transactions.map((t) => t.date);
  const start = minDate(dates);
  const end = maxDate(dates);
  return start && end ? { start, end } : null;
}

export function scrubTransactions(input: ScrubInput, config: UnderwritingConfig): ScrubResult {
  const structuralLabels = qualifyingStructuralLabels(input.transactions, config);

  const transactions: ScrubbedTransaction[] = input.transactions.map((txn) =>
    Object.freeze({
      ...txn,
      category: categorize(txn, config, structuralLabels),
      isInternalTransfer: isTransfer(txn, config),
    }),
  );

  const coverage = coverageWindow(input);
  return {
    transactions,
    dailyBalances: computeDailyBalances(transactions, coverage, input.openingBalance),
    revenue: computeRevenueMetrics(transactions, coverage, config.categories),
    coverage,
  };
}
