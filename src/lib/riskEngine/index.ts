export type {
  RedFlag,
  RedFlagCode,
  RedFlagSeverity,
  RevenueVelocity,
  RiskInput,
  RiskMetrics,
  RiskProfile,
  RiskSignal,
  RiskTier,
  ScoreRiskOptions,
  VelocityTrend,
} from "./types";

export { RISK_SIGNALS } from "./types";
export { scoreRisk, computeDeductions, computeRiskMetrics, tierFromScore } from "./scoreRisk";
export { detectRedFlags } from "./redFlags";
export {
  countNsf,
  daysSinceFunding,
  debtToIncome,
  gamblingActivity,
  legalActionHits,
  negativeBalanceDays,
  returnedItems,
  revenueVelocity,
} from "./signals";
