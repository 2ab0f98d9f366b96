/**
 * Scrubber: Types
 */

import type {
  DailyBalance,
  ScrubbedTransaction,
  StatementPeriod,
  Transaction,
} from "@/lib/statementModel/types";

/** The slice of an extraction result the scrubber reads. */
export type ScrubInput = {
  transactions: readonly Transaction[];
  period: StatementPeriod | null;
  openingBalance: number | null;
};

export type MonthlyRevenue = {
  /** YYYY-MM */
  month: string;
  deposits: number;
  withdrawals: number;
  net: number;
};

export type DepositConcentration = {
  topSource: string | null;
  /** 0–1 share of gross deposits from topSource */
  topSourceShare: number;
};

export type CashDeposits = {
  total: number;
  /** 0–1 share of gross deposits */
  share: number;
};

export type RevenueMetrics = {
  grossDeposits: number;
  /** Positive magnitude; excludes debt service and transfers */
  grossWithdrawals: number;
  netRevenue: number;
  /** Chronological, one row per calendar month covered */
  monthlyBreakdown: MonthlyRevenue[];
  averageMonthlyDeposits: number;
  depositConcentration: DepositConcentration;
  cashDeposits: CashDeposits;
};

export type ScrubResult = {
  transactions: ScrubbedTransaction[];
  dailyBalances: DailyBalance[];
  revenue: RevenueMetrics;
  /** Statement period, or the span of transaction dates */
  coverage: StatementPeriod | null;
};
