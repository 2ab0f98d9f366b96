/**
 * Position Engine: Single Position
 *
 * From a lender's payments: frequency, average payment, monthly cost,
 * original funding (matched deposit or back-calculated), remaining
 * balance, projected payoff and payment trend.
 *
 * Pure function: no IO.
 */

import type { UnderwritingConfig } from "@/lib/config/types";
import { addDays, daysBetween } from "@/lib/dates/isoDate";
import { roundCents, sumCents } from "@/lib/statementModel/money";
import type { ScrubbedTransaction, StatementPeriod } from "@/lib/statementModel/types";
import { classifyFrequency } from "./frequency";
import { findFundingDeposit } from "./fundingDeposit";
import type { MCAPosition, MatchedTier, PaymentFrequency, PaymentTrend } from "./types";

type PositionPolicy = UnderwritingConfig["policy"]["positions"];

export interface PositionContext {
  /** Every scrubbed transaction, for funding-deposit search */
  transactions: readonly ScrubbedTransaction[];
  coverage: StatementPeriod | null;
  asOf: string;
  config: UnderwritingConfig;
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((s, v) => s + v, 0) / values.length;
}

export function paymentTrend(
  amounts: readonly number[],
  lastPaymentDate: string,
  frequency: PaymentFrequency,
  asOf: string,
  policy: PositionPolicy,
): PaymentTrend {
  const stoppedAfter = Math.max(
    policy.intervalDays[frequency] * policy.stoppedIntervalMultiple,
    policy.stoppedMinimumDays,
  );
  if (daysBetween(lastPaymentDate, asOf) > stoppedAfter) return "stopped";
  if (amounts.length < 2) return "stable";

  const firstHalf = mean(amounts.slice(0, Math.floor(amounts.length / 2)));
  const secondHalf = mean(amounts.slice(Math.ceil(amounts.length / 2)));
  if (firstHalf === 0) return "stable";
  const change = (secondHalf - firstHalf) / firstHalf;
  if (change > policy.trendChangeThreshold) return "increased";
  if (change < -policy.trendChangeThreshold) return "decreased";
  return "stable";
}

/** Date cumulative payments first reach `funding`, or null. */
function dateFundingReached(members: readonly ScrubbedTransaction[], funding: number): string | null {
  let cumulative = 0;
  for (const m of members) {
    cumulative = roundCents(cumulative + Math.abs(m.amount));
    if (cumulative >= funding) return m.date;
  }
  return null;
}

export function reconstructPosition(
  lenderLabel: string,
  matchedTier: MatchedTier,
  payments: readonly ScrubbedTransaction[],
  ctx: PositionContext,
): MCAPosition | null {
  const policy = ctx.config.policy.positions;
  const members = [...payments].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  const first = members[0];
  const last = members[members.length - 1];
  if (!first || !last) return null;

  const amounts = members.map((m) => Math.abs(m.amount));
  const totalPaid = sumCents(amounts);
  const averagePayment = roundCents(totalPaid / members.length);
  const paymentFrequency = classifyFrequency(
    members.map((m) => m.date),
    ctx.coverage,
    policy,
  );
  const monthlyCost = roundCents(averagePayment * policy.paymentsPerMonth[paymentFrequency]);
  const factorRate = ctx.config.lenders.factorRates.get(lenderLabel) ?? policy.defaultFactorRate;

  const fundingDeposit = findFundingDeposit(
    lenderLabel,
    matchedTier,
    first.date,
    averagePayment,
    ctx.transactions,
    ctx.config,
  );
  const estimatedOriginalFunding = fundingDeposit
    ? fundingDeposit.amount
    : roundCents((monthlyCost * policy.assumedTermMonths) / factorRate);
  const estimatedRemainingBalance = Math.max(0, roundCents(estimatedOriginalFunding - totalPaid));

  let estimatedPayoffDate = dateFundingReached(members, estimatedOriginalFunding);
  if (estimatedPayoffDate === null) {
    const remainingPayments = averagePayment > 0 ? estimatedRemainingBalance / averagePayment : 0;
    estimatedPayoffDate = addDays(
      last.date,
      Math.ceil(remainingPayments * policy.intervalDays[paymentFrequency]),
    );
  }

  return {
    lenderLabel,
    matchedTier,
    memberTransactions: members,
    paymentFrequency,
    averagePayment,
    monthlyCost,
    factorRate,
    estimatedOriginalFunding,
    estimatedTotalPayback: roundCents(estimatedOriginalFunding * factorRate),
    totalPaid,
    estimatedRemainingBalance,
    estimatedPayoffDate,
    paymentTrend: paymentTrend(amounts, last.date, paymentFrequency, ctx.asOf, policy),
    firstPaymentDate: first.date,
    lastPaymentDate: last.date,
    fundingDeposit,
  };
}
