/**
 * Risk Engine: Red Flags
 *
 * Independent of the score weights. Evaluation order is fixed and is the
 * order flags are reported in.
 */

import type { LegalActionCode } from "@/lib/config/types";
import type { QualityStatus } from "@/lib/extractionQuality/types";
import type { RedFlag, RiskMetrics } from "./types";

export const HEAVY_STACKING_POSITIONS = 5;
export const MODERATE_STACKING_POSITIONS = 3;
export const HIGH_NSF_COUNT = 3;
export const HIGH_NEGATIVE_DAYS = 5;
export const CRITICAL_DTI = 0.5;
export const HIGH_DTI = 0.35;
export const VERY_RECENT_FUNDING_DAYS = 14;
export const RECENT_FUNDING_DAYS = 30;
export const RETURNED_ITEM_COUNT = 3;
export const RETURNED_ITEM_TOTAL = 10000;
export const STOPPED_POSITIONS = 2;

const LEGAL_ORDER: readonly LegalActionCode[] = ["GARNISHMENT", "TAX_LEVY", "LIEN", "JUDGMENT", "BANKRUPTCY"];

const LEGAL_LABELS: Record<LegalActionCode, string> = {
  GARNISHMENT: "garnishment",
  TAX_LEVY: "tax levy",
  LIEN: "lien",
  JUDGMENT: "judgment",
  BANKRUPTCY: "bankruptcy",
};

const dollars = (n: number) => `$${Math.round(n).toLocaleString("en-US")}`;

export function noTransactionsFlag(): RedFlag {
  return { code: "NO_TRANSACTIONS", severity: "CRITICAL", detail: "No transactions were extracted from the statement" };
}

export function detectRedFlags(m: RiskMetrics, quality: { status: QualityStatus; score: number }): RedFlag[] {
  const flags: RedFlag[] = [];

  if (quality.status !== "GOOD") {
    flags.push({
      code: "EXTRACTION_QUALITY",
      severity: quality.status === "POOR" ? "HIGH" : "MEDIUM",
      detail: `Extraction quality ${quality.status} (score ${quality.score})`,
    });
  }

  if (m.nsfCount > 0) {
    flags.push({
      code: "NSF_ACTIVITY",
      severity: m.nsfCount >= HIGH_NSF_COUNT ? "HIGH" : "MEDIUM",
      detail: `${m.nsfCount} NSF / overdraft item(s)`,
    });
  }

  if (m.negativeBalanceDays > 0) {
    flags.push({
      code: "NEGATIVE_BALANCE_DAYS",
      severity: m.negativeBalanceDays >= HIGH_NEGATIVE_DAYS ? "HIGH" : "MEDIUM",
      detail: `${m.negativeBalanceDays} day(s) ended with a negative balance`,
    });
  }

  if (m.debtToIncome >= HIGH_DTI) {
    flags.push({
      code: "HIGH_DTI",
      severity: m.debtToIncome >= CRITICAL_DTI ? "CRITICAL" : "HIGH",
      detail: `Debt service is ${(m.debtToIncome * 100).toFixed(1)}% of average monthly deposits`,
    });
  }

  if (m.gamblingCount > 0) {
    flags.push({
      code: "GAMBLING",
      severity: "HIGH",
      detail: `${m.gamblingCount} gambling transaction(s) totaling ${dollars(m.gamblingTotal)}`,
    });
  }

  const positions = `${m.stackingCount} active MCA positions detected`;
  if (m.stackingCount >= HEAVY_STACKING_POSITIONS) {
    flags.push({ code: "HEAVY_STACKING", severity: "CRITICAL", detail: positions });
  } else if (m.stackingCount >= MODERATE_STACKING_POSITIONS) {
    flags.push({ code: "MODERATE_STACKING", severity: "HIGH", detail: positions });
  } else if (m.stackingCount === 2) {
    flags.push({ code: "STACKING", severity: "MEDIUM", detail: positions });
  }

  if (m.daysSinceFunding !== null) {
    if (m.daysSinceFunding <= VERY_RECENT_FUNDING_DAYS) {
      flags.push({
        code: "VERY_RECENT_FUNDING",
        severity: "CRITICAL",
        detail: `Most recent funding only ${m.daysSinceFunding} days ago`,
      });
    } else if (m.daysSinceFunding <= RECENT_FUNDING_DAYS) {
      flags.push({
        code: "RECENT_FUNDING",
        severity: "HIGH",
        detail: `Funding received ${m.daysSinceFunding} days ago`,
      });
    }
  }

  for (const code of LEGAL_ORDER) {
    const hits = m.legalHits[code];
    if (hits > 0) {
      flags.push({ code, severity: "HIGH", detail: `${hits} ${LEGAL_LABELS[code]} reference(s)` });
    }
  }

  const velocity = m.velocity;
  if (velocity.trend === "accelerating_decline" || velocity.trend === "declining") {
    flags.push({
      code: "REVENUE_DECLINE",
      severity: velocity.trend === "accelerating_decline" ? "HIGH" : "MEDIUM",
      detail: `Deposits changing ${velocity.averageChangePct ?? 0}% per month`,
    });
  }

  if (m.stoppedPositions >= STOPPED_POSITIONS) {
    flags.push({
      code: "STOPPED_PAYMENTS",
      severity: "HIGH",
      detail: `${m.stoppedPositions} MCA positions show stopped payments`,
    });
  }

  if (m.returnedItemCount >= RETURNED_ITEM_COUNT || m.returnedItemTotal >= RETURNED_ITEM_TOTAL) {
    flags.push({
      code: "RETURNED_DEPOSITS",
      severity: "HIGH",
      detail: `${m.returnedItemCount} returned items, ${dollars(m.returnedItemTotal)} total`,
    });
  }

  return flags;
}
