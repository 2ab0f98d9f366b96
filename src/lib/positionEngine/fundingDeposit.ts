/**
 * Position Engine: Funding Deposit
 *
 * The advance that started a position: a credit of at least
 * max(minimum, multiple × payment), landing within the lookback window
 * before the first payment, that names the lender or reads like funding
 * (wire in, loan proceeds, "FUNDING", "ADVANCE"). Closest to the first
 * payment wins; larger amount breaks ties.
 */

import type { UnderwritingConfig } from "@/lib/config/types";
import { daysBetween } from "@/lib/dates/isoDate";
import { matchLender } from "@/lib/lenders/matchLender";
import { normalizeDescription } from "@/lib/lenders/normalize";
import type { ScrubbedTransaction } from "@/lib/statementModel/types";
import type { FundingDeposit, MatchedTier } from "./types";

function namesLender(description: string, label: string, tier: MatchedTier, config: UnderwritingConfig): boolean {
  if (tier <= 2) return matchLender(description, config.lenders, { structural: false })?.lender === label;
  return ` ${normalizeDescription(description)} `.includes(` ${normalizeDescription(label)} `);
}

export function readsLikeFunding(txn: ScrubbedTransaction, config: UnderwritingConfig): boolean {
  return txn.category === "loan_proceeds" || config.riskKeywords.funding.some((p) => p.test(txn.description));
}

export function findFundingDeposit(
  label: string,
  tier: MatchedTier,
  firstPaymentDate: string,
  averagePayment: number,
  transactions: readonly ScrubbedTransaction[],
  config: UnderwritingConfig,
): FundingDeposit | null {
  const policy = config.policy.positions;
  const minimum = Math.max(policy.fundingMinimumAmount, policy.fundingPaymentMultiple * averagePayment);

  let best: ScrubbedTransaction | null = null;
  let bestGap = Infinity;
  for (const txn of transactions) {
    if (txn.amount < minimum || txn.isInternalTransfer) continue;
    const gap = daysBetween(txn.date, firstPaymentDate);
    if (gap < 0 || gap > policy.fundingLookbackDays) continue;
    if (!namesLender(txn.description, label, tier, config) && !readsLikeFunding(txn, config)) continue;
    if (gap < bestGap || (gap === bestGap && best !== null && txn.amount > best.amount)) {
      best = txn;
      bestGap = gap;
    }
  }
  return best ? { date: best.date, amount: best.amount, description: best.description } : null;
}
