/**
 * Risk Engine: Signals
 *
 * Raw measurements behind the score. Pure functions: no IO, no weights.
 */

import type { LegalActionCode, RiskKeywordTables, UnderwritingConfig } from "@/lib/config/types";
import { daysBetween, maxDate } from "@/lib/dates/isoDate";
import type { PositionReport } from "@/lib/positionEngine/types";
import type { MonthlyRevenue } from "@/lib/scrubber/types";
import { sumCents } from "@/lib/statementModel/money";
import type { DailyBalance, ScrubbedTransaction } from "@/lib/statementModel/types";
import type { RevenueVelocity } from "./types";

type RiskPolicy = UnderwritingConfig["policy"]["risk"];

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

// ---------------------------------------------------------------------------
// Account conduct
// ---------------------------------------------------------------------------

/** NSF / overdraft charges, excluding waived or reversed ones. */
export function countNsf(transactions: readonly ScrubbedTransaction[], keywords: RiskKeywordTables): number {
  return transactions.filter(
    (t) =>
      t.amount < 0 &&
      keywords.nsf.some((p) => p.test(t.description)) &&
      !keywords.nsfWaivers.some((p) => p.test(t.description)),
  ).length;
}

export function negativeBalanceDays(dailyBalances: readonly DailyBalance[]) {
  let known = 0;
  let negative = 0;
  for (const d of dailyBalances) {
    if (d.endingBalance === null) continue;
    known++;
    if (d.endingBalance < 0) negative++;
  }
  return { negative, known, pct: known > 0 ? round2((negative / known) * 100) : 0 };
}

/** 1 when there is debt service and no deposits to carry it. */
export function debtToIncome(monthlyDebtService: number, averageMonthlyDeposits: number): number {
  if (averageMonthlyDeposits > 0) return Math.round((monthlyDebtService / averageMonthlyDeposits) * 10000) / 10000;
  return monthlyDebtService > 0 ? 1 : 0;
}

export function gamblingActivity(transactions: readonly ScrubbedTransaction[]) {
  const hits = transactions.filter((t) => t.category === "gambling");
  return { count: hits.length, total: sumCents(hits.map((t) => Math.abs(t.amount))) };
}

export function returnedItems(transactions: readonly ScrubbedTransaction[]) {
  const items = transactions.filter((t) => t.category === "returned_item");
  return {
    count: items.length,
    total: sumCents(items.filter((t) => t.amount < 0).map((t) => Math.abs(t.amount))),
  };
}

export function legalActionHits(
  transactions: readonly ScrubbedTransaction[],
  keywords: RiskKeywordTables,
): Record<LegalActionCode, number> {
  const hits: Record<LegalActionCode, number> = {
    GARNISHMENT: 0,
    TAX_LEVY: 0,
    LIEN: 0,
    JUDGMENT: 0,
    BANKRUPTCY: 0,
  };
  for (const t of transactions) {
    for (const group of keywords.legal) {
      if (group.patterns.some((p) => p.test(t.description))) hits[group.code]++;
    }
  }
  return hits;
}

// ---------------------------------------------------------------------------
// Funding recency
// ---------------------------------------------------------------------------

/**
 * Days from the latest funding event to `asOf`: matched position funding
 * deposits plus large loan-proceeds / funding-vocabulary credits.
 */
export function daysSinceFunding(
  transactions: readonly ScrubbedTransaction[],
  positions: PositionReport,
  asOf: string,
  config: UnderwritingConfig,
): number | null {
  const dates: string[] = [];
  for (const p of positions.positions) if (p.fundingDeposit) dates.push(p.fundingDeposit.date);
  for (const t of transactions) {
    if (t.amount < config.policy.risk.fundingEventMinimum || t.isInternalTransfer) continue;
    if (t.category === "loan_proceeds" || config.riskKeywords.funding.some((p) => p.test(t.description))) {
      dates.push(t.date);
    }
  }
  const latest = maxDate(dates);
  return latest === null ? null : Math.max(0, daysBetween(latest, asOf));
}

// ---------------------------------------------------------------------------
// Revenue velocity
// ---------------------------------------------------------------------------

export function revenueVelocity(months: readonly MonthlyRevenue[], policy: RiskPolicy): RevenueVelocity {
  const changes: number[] = [];
  for (let i = 1; i < months.length; i++) {
    const prev = months[i - 1];
    const cur = months[i];
    if (!prev || !cur || prev.deposits <= 0) continue;
    changes.push(round2(((cur.deposits - prev.deposits) / prev.deposits) * 100));
  }
  const first = changes[0];
  const last = changes[changes.length - 1];
  if (first === undefined || last === undefined) {
    return { monthlyChangesPct: [], averageChangePct: null, accelerationPct: null, trend: "insufficient_data" };
  }

  const average = round2(changes.reduce((s, c) => s + c, 0) / changes.length);
  const acceleration = changes.length >= 2 ? round2(last - first) : null;
  let trend: RevenueVelocity["trend"] = "stable";
  if (average <= policy.velocityDeclinePct) {
    trend =
      acceleration !== null && acceleration <= policy.velocityAccelerationPct ? "accelerating_decline" : "declining";
  } else if (average >= policy.velocityGrowthPct) {
    trend = "growing";
  }
  return { monthlyChangesPct: changes, averageChangePct: average, accelerationPct: acceleration, trend };
}
