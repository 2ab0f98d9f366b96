import type { UnderwritingConfig } from "@/lib/config/types";
import { validateExtraction } from "@/lib/extractionQuality/validateExtraction";
import type { ExtractionQualityReport } from "@/lib/extractionQuality/types";
import { extractTransactions } from "@/lib/statementExtract/extractTransactions";
import type { ExtractionResult } from "@/lib/statementExtract/types";
import type { BankFormat, RawStatement } from "@/lib/statementModel/types";

/** One extract + validate run for a given format. */
export type ExtractionPass = {
  format: BankFormat;
  extraction: ExtractionResult;
  quality: ExtractionQualityReport;
};

export function runExtractionPass(
  statement: RawStatement,
  format: BankFormat,
  config: UnderwritingConfig,
  now: Date,
): ExtractionPass {
  const extraction = extractTransactions(statement, format, now);
  const quality = validateExtraction(
    {
      transactions: extraction.transactions,
      period: extraction.period,
      openingBalance: extraction.openingBalance,
      closingBalance: extraction.closingBalance,
    },
    config,
  );
  return { format, extraction, quality };
}
