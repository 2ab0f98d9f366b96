/**
 * Risk Scorer
 *
 * Starts at 100 and deducts per signal, each capped by policy:
 *   NSF · negative days · DTI · gambling · stacking · funding recency ·
 *   legal actions · revenue trend · low revenue · cash share · extraction
 *
 * Pure function: no IO. All weights come from config/policy.json.
 */

import type { UnderwritingConfig } from "@/lib/config/types";
import { maxDate } from "@/lib/dates/isoDate";
import { detectRedFlags, noTransactionsFlag } from "./redFlags";
import {
  countNsf,
  daysSinceFunding,
  debtToIncome,
  gamblingActivity,
  legalActionHits,
  negativeBalanceDays,
  returnedItems,
  revenueVelocity,
} from "./signals";
import type { RiskInput, RiskMetrics, RiskProfile, RiskSignal, RiskTier, ScoreRiskOptions } from "./types";

type RiskPolicy = UnderwritingConfig["policy"]["risk"];

function clamp(n: number, min = 0, max = 100) {
  return Math.max(min, Math.min(max, n));
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function tierFromScore(score: number, policy: RiskPolicy): RiskTier {
  for (const band of policy.tiers) if (score >= band.min) return band.tier;
  return "Decline";
}

function emptySignals(): Record<RiskSignal, number> {
  return {
    nsf_activity: 0,
    negative_balance_days: 0,
    debt_to_income: 0,
    gambling: 0,
    stacking: 0,
    recent_funding: 0,
    legal_actions: 0,
    revenue_trend: 0,
    low_revenue: 0,
    cash_deposits: 0,
    extraction_quality: 0,
  };
}

export function computeRiskMetrics(input: RiskInput, config: UnderwritingConfig, asOf: string): RiskMetrics {
  const negative = negativeBalanceDays(input.dailyBalances);
  const gambling = gamblingActivity(input.transactions);
  const returned = returnedItems(input.transactions);
  return {
    nsfCount: countNsf(input.transactions, config.riskKeywords),
    negativeBalanceDays: negative.negative,
    knownBalanceDays: negative.known,
    negativeBalancePct: negative.pct,
    debtToIncome: debtToIncome(input.positions.totalMonthlyCost, input.revenue.averageMonthlyDeposits),
    gamblingCount: gambling.count,
    gamblingTotal: gambling.total,
    stackingCount: input.positions.stackingCount,
    stoppedPositions: input.positions.positions.filter((p) => p.paymentTrend === "stopped").length,
    daysSinceFunding: daysSinceFunding(input.transactions, input.positions, asOf, config),
    legalHits: legalActionHits(input.transactions, config.riskKeywords),
    velocity: revenueVelocity(input.revenue.monthlyBreakdown, config.policy.risk),
    averageMonthlyDeposits: input.revenue.averageMonthlyDeposits,
    cashDepositShare: input.revenue.cashDeposits.share,
    returnedItemCount: returned.count,
    returnedItemTotal: returned.total,
  };
}

export function computeDeductions(
  m: RiskMetrics,
  qualityStatus: RiskInput["quality"]["status"],
  policy: RiskPolicy,
): Record<RiskSignal, number> {
  const d = emptySignals();

  d.nsf_activity = Math.min(policy.nsfCap, m.nsfCount * policy.nsfPerItem);

  let negative = Math.min(policy.negativeDayCap, m.negativeBalancePct * policy.negativeDayPctMultiplier);
  if (m.negativeBalanceDays >= policy.negativeDayFloorCount) negative = Math.max(negative, policy.negativeDayFloor);
  d.negative_balance_days = round2(negative);

  const bands = [...policy.dtiBands].sort((a, b) => b.min - a.min);
  d.debt_to_income = bands.find((b) => m.debtToIncome >= b.min)?.deduction ?? 0;

  d.gambling = m.gamblingCount > 0 ? policy.gambling : 0;

  if (m.stackingCount === 1) d.stacking = policy.singlePosition;
  else if (m.stackingCount >= 2) d.stacking = Math.min(policy.stackingCap, m.stackingCount * policy.stackingPerPosition);

  if (m.daysSinceFunding !== null) {
    if (m.daysSinceFunding <= policy.veryRecentFundingDays) d.recent_funding = policy.veryRecentFunding;
    else if (m.daysSinceFunding <= policy.recentFundingDays) d.recent_funding = policy.recentFunding;
  }

  const legal = Object.values(m.legalHits).reduce((s, n) => s + n, 0);
  d.legal_actions = Math.min(policy.legalCap, legal * policy.legalPerHit);

  if (m.velocity.trend === "accelerating_decline") d.revenue_trend = policy.acceleratingDecline;
  else if (m.velocity.trend === "declining") d.revenue_trend = policy.declining;

  d.low_revenue = m.averageMonthlyDeposits < policy.lowRevenueThreshold ? policy.lowRevenue : 0;
  d.cash_deposits = m.cashDepositShare > policy.cashShareThreshold ? policy.cashHeavy : 0;

  if (qualityStatus === "POOR") d.extraction_quality = policy.qualityPoor;
  else if (qualityStatus === "NEEDS_REVIEW") d.extraction_quality = policy.qualityNeedsReview;

  return d;
}

export function scoreRisk(input: RiskInput, config: UnderwritingConfig, options: ScoreRiskOptions = {}): RiskProfile {
  const policy = config.policy.risk;
  const asOf =
    options.asOf ?? input.coverage?.end ?? maxDate(input.transactions.map((t) => t.date)) ?? "1970-01-01";
  const metrics = computeRiskMetrics(input, config, asOf);

  if (input.transactions.length === 0) {
    return {
      riskScore: policy.noTransactionsScore,
      riskTier: tierFromScore(policy.noTransactionsScore, policy),
      componentSignals: emptySignals(),
      redFlags: [noTransactionsFlag()],
      metrics,
    };
  }

  const componentSignals = computeDeductions(metrics, input.quality.status, policy);
  const total = Object.values(componentSignals).reduce((s, v) => s + v, 0);
  const riskScore = Math.round(clamp(100 - total));

  return {
    riskScore,
    riskTier: tierFromScore(riskScore, policy),
    componentSignals,
    redFlags: detectRedFlags(metrics, input.quality),
    metrics,
  };
}
