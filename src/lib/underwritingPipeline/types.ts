/**
 * Underwriting Pipeline: Types
 */

import type { UnderwritingConfig } from "@/lib/config/types";
import type { ExtractionQualityReport } from "@/lib/extractionQuality/types";
import type { PositionReport } from "@/lib/positionEngine/types";
import type { RiskProfile } from "@/lib/riskEngine/types";
import type { RevenueMetrics } from "@/lib/scrubber/types";
import type {
  BankFormat,
  BankFormatId,
  DailyBalance,
  ScrubbedTransaction,
  StatementPeriod,
} from "@/lib/statementModel/types";
import type { CollaboratorErrorCode, PipelineDiagnostic } from "./errors";

// ---------------------------------------------------------------------------
// Re-extraction contract
// ---------------------------------------------------------------------------

export type ReExtractionRequest = {
  text: string;
  sourceIdentifier: string;
  quality: ExtractionQualityReport;
  currentFormat: BankFormatId;
};

export type ReExtractionSuggestion = {
  format: BankFormatId;
  /** 0–1 */
  confidence: number;
};

/** Called only for POOR extractions. null means "no better idea". */
/** `signal` aborts once the pipeline stops waiting for the answer. */
export type ReExtractor = (request: ReExtractionRequest, signal: AbortSignal) => Promise<ReExtractionSuggestion | null>;

export type ReExtractionOutcome = {
  suggestion: ReExtractionSuggestion | null;
  /** Score of the re-run extraction, when one ran */
  rerunScore: number | null;
  /** True when the re-run replaced the first extraction */
  adopted: boolean;
  error: CollaboratorErrorCode | null;
};

// ---------------------------------------------------------------------------
// Options & result
// ---------------------------------------------------------------------------

export type PipelineOptions = {
  config: UnderwritingConfig;
  /** Skip detection and use this format */
  formatOverride?: BankFormatId;
  reExtractor?: ReExtractor;
  /** Defaults to 20000 */
  reExtractionTimeoutMs?: number;
  /** Reference date for recency signals; defaults to the end of the statement */
  asOf?: string;
  /** Clock for year inference when a statement prints no year */
  now?: Date;
};

export type UnderwritingResult = {
  sourceIdentifier: string;
  format: BankFormat;
  extraction: {
    source: "text" | "table" | "none";
    period: StatementPeriod | null;
    openingBalance: number | null;
    closingBalance: number | null;
    transactionCount: number;
  };
  quality: ExtractionQualityReport;
  /** null when no re-extraction was attempted */
  reExtraction: ReExtractionOutcome | null;
  transactions: ScrubbedTransaction[];
  dailyBalances: DailyBalance[];
  revenue: RevenueMetrics;
  positions: PositionReport;
  risk: RiskProfile;
  diagnostics: PipelineDiagnostic[];
};
