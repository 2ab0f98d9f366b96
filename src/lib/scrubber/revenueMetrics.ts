/**
 * Scrubber: Revenue Metrics
 *
 * Over non-transfer transactions only:
 * - deposits: positive amounts in a revenue-bearing category
 * - withdrawals: negative amounts outside debt service
 * - other credits (loan proceeds, refunds, returned items) count as neither
 */

import type { CategoryTables } from "@/lib/config/types";
import { addDays, daysInMonth, monthKey, parseIsoDate } from "@/lib/dates/isoDate";
import { sourceKey } from "@/lib/lenders/normalize";
import { roundCents, sumCents } from "@/lib/statementModel/money";
import type { ScrubbedTransaction, StatementPeriod } from "@/lib/statementModel/types";
import type { DepositConcentration, MonthlyRevenue, RevenueMetrics } from "./types";

function roundShare(value: number): number {
  return Math.round(value * 10000) / 10000;
}

export function isRevenueDeposit(txn: ScrubbedTransaction, tables: CategoryTables): boolean {
  return !txn.isInternalTransfer && txn.amount > 0 && tables.revenueBearing.has(txn.category);
}

export function isOperatingWithdrawal(txn: ScrubbedTransaction, tables: CategoryTables): boolean {
  return !txn.isInternalTransfer && txn.amount < 0 && !tables.debtService.has(txn.category);
}

/** Every YYYY-MM from the coverage window plus any month a transaction falls in. */
function monthsCovered(transactions: readonly ScrubbedTransaction[], coverage: StatementPeriod | null): string[] {
  const months = new Set<string>(transactions.map((t) => monthKey(t.date)));
  if (coverage) {
    const last = monthKey(coverage.end);
    let cursor = `${monthKey(coverage.start)}-01`;
    while (monthKey(cursor) <= last) {
      months.add(monthKey(cursor));
      const { year, month } = parseIsoDate(cursor);
      cursor = addDays(cursor, daysInMonth(year, month));
    }
  }
  return [...months].sort();
}

function concentration(deposits: readonly ScrubbedTransaction[], total: number): DepositConcentration {
  const bySource = new Map<string, number>();
  for (const d of deposits) {
    const key = sourceKey(d.description);
    bySource.set(key, (bySource.get(key) ?? 0) + d.amount);
  }
  let topSource: string | null = null;
  let topAmount = 0;
  // Ties go to the source seen first.
  for (const [source, amount] of bySource) {
    if (amount > topAmount) {
      topSource = source;
      topAmount = amount;
    }
  }
  return { topSource, topSourceShare: total > 0 ? roundShare(topAmount / total) : 0 };
}

export function computeRevenueMetrics(
  transactions: readonly ScrubbedTransaction[],
  coverage: StatementPeriod | null,
  tables: CategoryTables,
): RevenueMetrics {
  const deposits = transactions.filter((t) => isRevenueDeposit(t, tables));
  const withdrawals = transactions.filter((t) => isOperatingWithdrawal(t, tables));
  const grossDeposits = sumCents(deposits.map((t) => t.amount));
  const grossWithdrawals = Math.abs(sumCents(withdrawals.map((t) => t.amount)));

  const monthlyBreakdown: MonthlyRevenue[] = monthsCovered(transactions, coverage).map((month) => {
    const dep = sumCents(deposits.filter((t) => monthKey(t.date) === month).map((t) => t.amount));
    const wd = Math.abs(sumCents(withdrawals.filter((t) => monthKey(t.date) === month).map((t) => t.amount)));
    return { month, deposits: dep, withdrawals: wd, net: roundCents(dep - wd) };
  });

  const cashTotal = sumCents(deposits.filter((t) => t.category === "cash_deposit").map((t) => t.amount));

  return {
    grossDeposits,
    grossWithdrawals,
    netRevenue: roundCents(grossDeposits - grossWithdrawals),
    monthlyBreakdown,
    averageMonthlyDeposits:
      monthlyBreakdown.length > 0 ? roundCents(grossDeposits / monthlyBreakdown.length) : 0,
    depositConcentration: concentration(deposits, grossDeposits),
    cashDeposits: {
      total: cashTotal,
      share: grossDeposits > 0 ? roundShare(cashTotal / grossDeposits) : 0,
    },
  };
}
