export type {
  ExtractionDiagnostic,
  ExtractionDiagnosticCode,
  ExtractionResult,
  ExtractionStrategy,
  SourceLine,
  StrategyContext,
  StrategyOutput,
  TransactionDraft,
} from "./types";
export type { StatementHeader } from "./statementHeader";
export type { ParsedAmount, YearContext } from "./tokens";

export { extractTransactions } from "./extractTransactions";
export { EXTRACTION_STRATEGIES } from "./registry";
export { extractStatementPeriod, readStatementHeader } from "./statementHeader";
export { leadingDateToken, parseAmount, parseDateToken, resolveYear } from "./tokens";
export { resolveSignedAmount, toSourceLines } from "./lineHelpers";
