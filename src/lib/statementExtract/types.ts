/**
 * Statement Extract: Types
 */

import type {
  BankFormatId,
  SourceLineRef,
  StatementPeriod,
  TableGrid,
  Transaction,
} from "@/lib/statementModel/types";

export interface SourceLine {
  /** Trimmed text; "" for blank lines */
  text: string;
  /** 1-based line number in the raw text */
  line: number;
}

export type ExtractionDiagnosticCode = "MALFORMED_LINE" | "ZERO_AMOUNT" | "TABLE_FALLBACK";

export interface ExtractionDiagnostic {
  code: ExtractionDiagnosticCode;
  ref: SourceLineRef | null;
  detail: string;
}

/** Mutable while a strategy builds it; frozen into a Transaction on return. */
export interface TransactionDraft {
  date: string;
  description: string;
  amount: number;
  runningBalance: number | null;
  sourceLineRef: SourceLineRef;
}

export interface StrategyContext {
  lines: SourceLine[];
  tables: TableGrid[];
  period: StatementPeriod | null;
  fallbackYear: number;
  openingBalance: number | null;
  /** Push-only sink for skipped lines */
  diagnostics: ExtractionDiagnostic[];
}

export interface StrategyOutput {
  transactions: TransactionDraft[];
  /** Stable re-sort by date (separate credit/debit/check blocks) */
  sortByDate: boolean;
}

export type ExtractionStrategy = (ctx: StrategyContext) => StrategyOutput;

export interface ExtractionResult {
  formatId: BankFormatId;
  transactions: Transaction[];
  period: StatementPeriod | null;
  openingBalance: number | null;
  closingBalance: number | null;
  source: "text" | "table" | "none";
  diagnostics: ExtractionDiagnostic[];
}
