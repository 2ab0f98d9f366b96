/**
 * Underwriting Config: Compiled Types
 *
 * Read-only after load. Every stage receives this object as an explicit
 * parameter.
 */
import type { BankFormatId, TransactionCategory } from "@/lib/statementModel/types";
import type { UnderwritingPolicy } from "./schema";

export interface CompiledPattern {
  source: string;
  regex: RegExp;
}

export interface BankFormatRule {
  id: Exclude<BankFormatId, "generic">;
  patterns: CompiledPattern[];
}

export interface LenderIdentifier {
  identifier: string;
  /** identifier with spaces removed, uppercased */
  compact: string;
  lender: string;
}

export interface LenderAlias {
  lender: string;
  /** normalized, corporate suffixes stripped */
  normalized: string;
  compact: string;
}

export interface LenderTables {
  identifiers: LenderIdentifier[];
  /** Longest alias first */
  aliases: LenderAlias[];
  factorRates: ReadonlyMap<string, number>;
  corporateSuffixes: string[];
  structuralPatterns: CompiledPattern[];
}

export type CategoryDirection = "credit" | "debit" | "any";

export interface CategoryRule {
  category: TransactionCategory;
  direction: CategoryDirection;
  patterns: RegExp[];
  includeRevenueKeywords: boolean;
  includeLenderPatterns: boolean;
}

export interface CategoryTables {
  transferVocabulary: RegExp[];
  revenueKeywords: RegExp[];
  revenueBearing: ReadonlySet<TransactionCategory>;
  debtService: ReadonlySet<TransactionCategory>;
  rules: CategoryRule[];
}

export type LegalActionCode = "GARNISHMENT" | "TAX_LEVY" | "LIEN" | "JUDGMENT" | "BANKRUPTCY";

export interface RiskKeywordTables {
  nsf: RegExp[];
  nsfWaivers: RegExp[];
  funding: RegExp[];
  legal: { code: LegalActionCode; patterns: RegExp[] }[];
}

export interface UnderwritingConfig {
  bankFormats: BankFormatRule[];
  lenders: LenderTables;
  categories: CategoryTables;
  riskKeywords: RiskKeywordTables;
  policy: UnderwritingPolicy;
}
