/**
 * Underwriting Pipeline
 *
 *   detect format → extract → validate → (re-extract on POOR) →
 *   scrub → reconstruct positions → score risk
 *
 * NON-NEGOTIABLE:
 *   - Only structurally invalid input throws, before any stage runs
 *   - Content problems become diagnostics on the result
 *   - Config is passed in; nothing is cached between runs
 *   - Same input, config, clock and asOf → same result
 */

import { reconstructPositions } from "@/lib/positionEngine/reconstructPositions";
import { scoreRisk } from "@/lib/riskEngine/scoreRisk";
import { scrubTransactions } from "@/lib/scrubber/scrubTransactions";
import { detectBankFormat, matchingBankFormats } from "@/lib/statementFormats/detectBankFormat";
import type { BankFormat, RawStatement } from "@/lib/statementModel/types";
import { InvalidStatementInputError, type PipelineDiagnostic } from "./errors";
import { runExtractionPass, type ExtractionPass } from "./extractionPass";
import { DEFAULT_RE_EXTRACTION_TIMEOUT_MS, attemptReExtraction } from "./reExtraction";
import { RawStatementSchema } from "./schema";
import type { PipelineOptions, ReExtractionOutcome, UnderwritingResult } from "./types";

export function parseStatementInput(input: unknown): RawStatement {
  const parsed = RawStatementSchema.safeParse(input);
  if (!parsed.success) {
    const { formErrors, fieldErrors } = parsed.error.flatten();
    const issues: Record<string, string[] | undefined> = { ...fieldErrors };
    if (formErrors.length > 0) issues["statement"] = formErrors;
    throw new InvalidStatementInputError(issues);
  }
  return parsed.data;
}

function passDiagnostics(pass: ExtractionPass): PipelineDiagnostic[] {
  const out: PipelineDiagnostic[] = [];
  const malformed = pass.extraction.diagnostics.filter((d) => d.code === "MALFORMED_LINE").length;
  if (malformed > 0) {
    out.push({ code: "MALFORMED_INPUT", stage: "extract", detail: `skipped ${malformed} malformed line(s)` });
  }
  const balance = pass.quality.checks.find((c) => c.name === "balance_reconciliation");
  if (balance && !balance.passed) {
    out.push({ code: "INCOMPLETE_RECONCILIATION", stage: "validate", detail: balance.detail });
  }
  if (pass.extraction.transactions.length === 0) {
    out.push({
      code: "NO_TRANSACTIONS_FOUND",
      stage: "extract",
      detail: `${pass.format.id} extraction found no transactions`,
    });
  }
  return out;
}

export async function runUnderwritingPipeline(input: unknown, options: PipelineOptions): Promise<UnderwritingResult> {
  const statement = parseStatementInput(input);
  const { config } = options;
  const now = options.now ?? new Date();
  const diagnostics: PipelineDiagnostic[] = [];

  let format: BankFormat;
  if (options.formatOverride) {
    format = { id: options.formatOverride, matchedPatterns: [] };
  } else {
    format = detectBankFormat(statement.text, config);
    const matching = matchingBankFormats(statement.text, config);
    if (matching.length > 1) {
      diagnostics.push({
        code: "AMBIGUOUS_FORMAT",
        stage: "detect",
        detail: `matched ${matching.join(", ")}; using ${format.id}`,
      });
    }
  }

  let pass = runExtractionPass(statement, format, config, now);
  let reExtraction: ReExtractionOutcome | null = null;
  if (pass.quality.status === "POOR" && options.reExtractor) {
    const attempt = await attemptReExtraction({
      statement,
      first: pass,
      reExtractor: options.reExtractor,
      timeoutMs: options.reExtractionTimeoutMs ?? DEFAULT_RE_EXTRACTION_TIMEOUT_MS,
      config,
      now,
    });
    reExtraction = attempt.outcome;
    pass = attempt.pass;
    if (attempt.outcome.error) {
      diagnostics.push({
        code: "RE_EXTRACTION_FAILED",
        stage: "re_extract",
        detail: `${attempt.outcome.error}; kept the first extraction`,
      });
    }
  }
  diagnostics.push(...passDiagnostics(pass));

  const { extraction, quality } = pass;
  const scrub = scrubTransactions(
    { transactions: extraction.transactions, period: extraction.period, openingBalance: extraction.openingBalance },
    config,
  );
  const positions = reconstructPositions(scrub, config, { asOf: options.asOf });
  const risk = scoreRisk({ ...scrub, positions, quality }, config, { asOf: options.asOf });

  return {
    sourceIdentifier: statement.sourceIdentifier,
    format: pass.format,
    extraction: {
      source: extraction.source,
      period: extraction.period,
      openingBalance: extraction.openingBalance,
      closingBalance: extraction.closingBalance,
      transactionCount: extraction.transactions.length,
    },
    quality,
    reExtraction,
    transactions: scrub.transactions,
    dailyBalances: scrub.dailyBalances,
    revenue: scrub.revenue,
    positions,
    risk,
    diagnostics,
  };
}
