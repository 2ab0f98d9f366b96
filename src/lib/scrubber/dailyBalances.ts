/**
 * Scrubber: Daily Balances
 *
 * One row per day of the coverage window: the last known balance on or
 * before that day. A printed running balance resets the known balance; a
 * transaction without one advances it by its amount. Days before any
 * balance is known stay null (a stated opening balance counts as known).
 */

import { eachDay } from "@/lib/dates/isoDate";
import { roundCents } from "@/lib/statementModel/money";
import type { DailyBalance, StatementPeriod, Transaction } from "@/lib/statementModel/types";

export function computeDailyBalances(
  transactions: readonly Transaction[],
  coverage: StatementPeriod | null,
  openingBalance: number | null,
): DailyBalance[] {
  if (!coverage) return [];

  // Stable: same-day transactions keep statement order.
  const ordered = [...transactions].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  let known = openingBalance;
  let next = 0;

  return eachDay(coverage.start, coverage.end).map((day) => {
    while (next < ordered.length) {
      const txn = ordered[next];
      if (!txn || txn.date > day) break;
      if (txn.runningBalance !== null) known = txn.runningBalance;
      else if (known !== null) known = roundCents(known + txn.amount);
      next++;
    }
    return { date: day, endingBalance: known };
  });
}
