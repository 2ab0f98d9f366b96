/**
 * Position Engine: Types
 *
 * Existing recurring-debt ("MCA") obligations reconstructed from payment
 * evidence on a bank statement.
 */

import type { ScrubbedTransaction, StatementPeriod } from "@/lib/statementModel/types";

export type PaymentFrequency = "daily" | "weekly" | "biweekly" | "monthly";

export type PaymentTrend = "stable" | "increased" | "decreased" | "stopped";

/** 1 identifier, 2 name/alias, 3 structural pattern, 4 recurring cluster */
export type MatchedTier = 1 | 2 | 3 | 4;

export interface FundingDeposit {
  date: string;
  amount: number;
  description: string;
}

export interface MCAPosition {
  lenderLabel: string;
  matchedTier: MatchedTier;
  /** Date order */
  memberTransactions: ScrubbedTransaction[];
  paymentFrequency: PaymentFrequency;
  averagePayment: number;
  /** averagePayment × payments per month */
  monthlyCost: number;
  factorRate: number;
  /** Matched funding deposit, else back-calculated from the monthly cost */
  estimatedOriginalFunding: number;
  /** estimatedOriginalFunding × factorRate */
  estimatedTotalPayback: number;
  totalPaid: number;
  /** max(0, funding − paid) */
  estimatedRemainingBalance: number;
  estimatedPayoffDate: string;
  paymentTrend: PaymentTrend;
  firstPaymentDate: string;
  lastPaymentDate: string;
  fundingDeposit: FundingDeposit | null;
}

export interface PositionReport {
  /** Monthly cost, highest first */
  positions: MCAPosition[];
  /** Positions whose payments have not stopped */
  stackingCount: number;
  /** Sum over active positions */
  totalMonthlyCost: number;
  /** Sum over all positions */
  totalRemainingBalance: number;
}

/** The slice of a scrub result the reconstructor reads. */
export interface PositionInput {
  transactions: readonly ScrubbedTransaction[];
  coverage: StatementPeriod | null;
}

export interface ReconstructOptions {
  /** Reference date for "stopped"; defaults to the end of coverage */
  asOf?: string;
}
