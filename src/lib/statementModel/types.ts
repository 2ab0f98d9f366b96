/**
 * Statement Model: Shared Types
 *
 * Canonical records passed between the underwriting stages.
 * Every record is produced once by its stage and read-only afterwards.
 */

// ---------------------------------------------------------------------------
// Formats
// ---------------------------------------------------------------------------

export const BANK_FORMAT_IDS = [
  "bank_of_bartlett",
  "city_bank_tx",
  "webster",
  "pnc",
  "truist",
  "chase",
  "bofa",
  "wells_fargo",
  "citibank",
  "us_bank",
  "generic",
] as const;

export type BankFormatId = (typeof BANK_FORMAT_IDS)[number];

export interface BankFormat {
  id: BankFormatId;
  /** Sources of the detection patterns that matched, in table order. Empty for generic. */
  matchedPatterns: string[];
}

// ---------------------------------------------------------------------------
// Input
// ---------------------------------------------------------------------------

/** A table grid as produced by the PDF-to-text collaborator: rows of cells. */
export type TableGrid = string[][];

export interface RawStatement {
  text: string;
  tables: TableGrid[];
  sourceIdentifier: string;
}

// ---------------------------------------------------------------------------
// Transactions
// ---------------------------------------------------------------------------

export type SourceLineRef =
  | { kind: "text"; line: number }
  | { kind: "table"; table: number; row: number };

export interface StatementPeriod {
  /** ISO date, inclusive */
  start: string;
  /** ISO date, inclusive */
  end: string;
}

export interface Transaction {
  /** ISO date (YYYY-MM-DD) */
  date: string;
  description: string;
  /** Positive = credit, negative = debit. Never zero. */
  amount: number;
  runningBalance: number | null;
  sourceLineRef: SourceLineRef;
}

// ---------------------------------------------------------------------------
// Scrubbed output
// ---------------------------------------------------------------------------

export const TRANSACTION_CATEGORIES = [
  "nsf_fee",
  "returned_item",
  "bank_fee",
  "loan_proceeds",
  "refund",
  "card_settlement",
  "cash_deposit",
  "deposit",
  "gambling",
  "payroll",
  "rent",
  "utilities",
  "telecom",
  "insurance",
  "taxes",
  "suppliers",
  "card_payment",
  "debt_service",
  "atm_withdrawal",
  "check",
  "card_purchase",
  "wire_out",
  "transfer",
  "other",
] as const;

export type TransactionCategory = (typeof TRANSACTION_CATEGORIES)[number];

export interface ScrubbedTransaction extends Transaction {
  category: TransactionCategory;
  isInternalTransfer: boolean;
}

export interface DailyBalance {
  date: string;
  /** null until a balance is known */
  endingBalance: number | null;
}
