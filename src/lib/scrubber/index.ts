export type {
  CashDeposits,
  DepositConcentration,
  MonthlyRevenue,
  RevenueMetrics,
  ScrubInput,
  ScrubResult,
} from "./types";

export { scrubTransactions, coverageWindow } from "./scrubTransactions";
export { categorize, isInternalTransfer, isTransfer, qualifyingStructuralLabels } from "./categorize";
export { computeDailyBalances } from "./dailyBalances";
export { computeRevenueMetrics, isOperatingWithdrawal, isRevenueDeposit } from "./revenueMetrics";
