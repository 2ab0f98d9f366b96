/**
 * Extraction Quality: Types
 */

import type { StatementPeriod, Transaction } from "@/lib/statementModel/types";

export const QUALITY_CHECK_NAMES = [
  "balance_reconciliation",
  "transaction_count",
  "credit_debit_sanity",
  "description_quality",
  "duplicates",
  "date_sanity",
] as const;

export type QualityCheckName = (typeof QUALITY_CHECK_NAMES)[number];

export type QualityStatus = "GOOD" | "NEEDS_REVIEW" | "POOR";

export type QualityCheck = {
  name: QualityCheckName;
  passed: boolean;
  detail: string;
  /** Points taken off the score; 0 when passed */
  deduction: number;
};

export type ExtractionQualityReport = {
  /** 0–100 integer. Higher is better. */
  score: number;
  status: QualityStatus;
  /** Always the six checks, in QUALITY_CHECK_NAMES order */
  checks: QualityCheck[];
  recommendation: string;
};

/** The slice of an extraction result the validator reads. */
export type ExtractionQualityInput = {
  transactions: readonly Transaction[];
  period: StatementPeriod | null;
  openingBalance: number | null;
  closingBalance: number | null;
};
