export type {
  FundingDeposit,
  MCAPosition,
  MatchedTier,
  PaymentFrequency,
  PaymentTrend,
  PositionInput,
  PositionReport,
  ReconstructOptions,
} from "./types";

export { reconstructPositions } from "./reconstructPositions";
export { reconstructPosition, paymentTrend } from "./reconstruct";
export { classifyFrequency, frequencyFromRate, gapStats, median, medianGap, monthlyPaymentRates } from "./frequency";
export { findRecurringClusters, clusterLabel } from "./clustering";
export { findFundingDeposit, readsLikeFunding } from "./fundingDeposit";
