/**
 * Risk Engine: Types
 *
 * One profile per statement: a 0–100 score (higher is safer), its tier,
 * the points each signal deducted, and red flags that stand on their own
 * regardless of weights.
 */

import type { LegalActionCode } from "@/lib/config/types";
import type { ExtractionQualityReport } from "@/lib/extractionQuality/types";
import type { PositionReport } from "@/lib/positionEngine/types";
import type { RevenueMetrics } from "@/lib/scrubber/types";
import type { DailyBalance, ScrubbedTransaction, StatementPeriod } from "@/lib/statementModel/types";

export type RiskTier = "A" | "B" | "C" | "D" | "Decline";

export type RedFlagSeverity = "CRITICAL" | "HIGH" | "MEDIUM";

export type RedFlagCode =
  | "NO_TRANSACTIONS"
  | "EXTRACTION_QUALITY"
  | "NSF_ACTIVITY"
  | "NEGATIVE_BALANCE_DAYS"
  | "HIGH_DTI"
  | "GAMBLING"
  | "HEAVY_STACKING"
  | "MODERATE_STACKING"
  | "STACKING"
  | "VERY_RECENT_FUNDING"
  | "RECENT_FUNDING"
  | LegalActionCode
  | "REVENUE_DECLINE"
  | "STOPPED_PAYMENTS"
  | "RETURNED_DEPOSITS";

export type RedFlag = {
  code: RedFlagCode;
  severity: RedFlagSeverity;
  detail: string;
};

export const RISK_SIGNALS = [
  "nsf_activity",
  "negative_balance_days",
  "debt_to_income",
  "gambling",
  "stacking",
  "recent_funding",
  "legal_actions",
  "revenue_trend",
  "low_revenue",
  "cash_deposits",
  "extraction_quality",
] as const;

export type RiskSignal = (typeof RISK_SIGNALS)[number];

export type VelocityTrend = "accelerating_decline" | "declining" | "stable" | "growing" | "insufficient_data";

export type RevenueVelocity = {
  /** Month-over-month deposit change, percent, one per consecutive month pair */
  monthlyChangesPct: number[];
  averageChangePct: number | null;
  /** Last change minus first change; null with fewer than two changes */
  accelerationPct: number | null;
  trend: VelocityTrend;
};

export type RiskMetrics = {
  nsfCount: number;
  negativeBalanceDays: number;
  /** Days with a known ending balance */
  knownBalanceDays: number;
  /** 0–100 */
  negativeBalancePct: number;
  /** Active monthly debt service ÷ average monthly deposits */
  debtToIncome: number;
  gamblingCount: number;
  gamblingTotal: number;
  stackingCount: number;
  stoppedPositions: number;
  /** Most recent funding event to the reference date; null when none */
  daysSinceFunding: number | null;
  legalHits: Record<LegalActionCode, number>;
  velocity: RevenueVelocity;
  averageMonthlyDeposits: number;
  cashDepositShare: number;
  returnedItemCount: number;
  returnedItemTotal: number;
};

export type RiskProfile = {
  riskScore: number;
  riskTier: RiskTier;
  /** Points deducted per signal */
  componentSignals: Record<RiskSignal, number>;
  redFlags: RedFlag[];
  metrics: RiskMetrics;
};

/** Everything the scorer reads from the earlier stages. */
export type RiskInput = {
  transactions: readonly ScrubbedTransaction[];
  dailyBalances: readonly DailyBalance[];
  revenue: RevenueMetrics;
  coverage: StatementPeriod | null;
  positions: PositionReport;
  quality: ExtractionQualityReport;
};

export type ScoreRiskOptions = {
  /** Reference date for funding recency; defaults to the end of coverage */
  asOf?: string;
};
