/**
 * Transaction Extractor
 *
 * Reads the statement header, strips page boilerplate, dispatches to the
 * format's strategy and finalizes the drafts:
 * - text strategies that find nothing fall back to the table grids
 * - zero amounts are dropped
 * - block layouts are stably re-sorted by date
 *
 * Never throws on content; an empty result is a quality signal.
 */

import { roundCents } from "@/lib/statementModel/money";
import type { BankFormat, RawStatement, Transaction } from "@/lib/statementModel/types";
import { toSourceLines } from "./lineHelpers";
import { EXTRACTION_STRATEGIES } from "./registry";
import { readStatementHeader } from "./statementHeader";
import { extractGeneric } from "./strategies/generic";
import { parseTableTransactions } from "./tableRows";
import type { ExtractionResult, StrategyContext, StrategyOutput, TransactionDraft } from "./types";

function finalize(drafts: TransactionDraft[], ctx: StrategyContext): Transaction[] {
  const out: Transaction[] = [];
  for (const d of drafts) {
    const amount = roundCents(d.amount);
    if (amount === 0) {
      ctx.diagnostics.push({ code: "ZERO_AMOUNT", ref: d.sourceLineRef, detail: d.description.slice(0, 120) });
      continue;
    }
    out.push(
      Object.freeze({
        date: d.date,
        description: d.description,
        amount,
        runningBalance: d.runningBalance === null ? null : roundCents(d.runningBalance),
        sourceLineRef: d.sourceLineRef,
      }),
    );
  }
  return out;
}

export function extractTransactions(
  statement: RawStatement,
  format: BankFormat,
  now: Date = new Date(),
): ExtractionResult {
  const header = readStatementHeader(statement.text, now);
  const ctx: StrategyContext = {
    lines: toSourceLines(statement.text),
    tables: statement.tables,
    period: header.period,
    fallbackYear: header.fallbackYear,
    openingBalance: header.openingBalance,
    diagnostics: [],
  };

  const strategy = EXTRACTION_STRATEGIES[format.id];
  let output: StrategyOutput = strategy(ctx);
  let source: ExtractionResult["source"] = "text";

  if (strategy === extractGeneric) {
    source = output.transactions.some((t) => t.sourceLineRef.kind === "table") ? "table" : "text";
  } else if (output.transactions.length === 0 && ctx.tables.length > 0) {
    output = { transactions: parseTableTransactions(ctx), sortByDate: false };
    source = "table";
    ctx.diagnostics.push({
      code: "TABLE_FALLBACK",
      ref: null,
      detail: `${format.id} layout matched no lines; read ${output.transactions.length} row(s) from tables`,
    });
  }

  const drafts = output.sortByDate
    ? [...output.transactions].sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0))
    : output.transactions;
  const transactions = finalize(drafts, ctx);
  if (transactions.length === 0) source = "none";

  const malformed = ctx.diagnostics.filter((d) => d.code === "MALFORMED_LINE").length;
  if (malformed > 0) {
    console.warn(`[extractTransactions] ${statement.sourceIdentifier}: skipped ${malformed} malformed line(s)`);
  }

  return {
    formatId: format.id,
    transactions,
    period: header.period,
    openingBalance: header.openingBalance,
    closingBalance: header.closingBalance,
    source,
    diagnostics: ctx.diagnostics,
  };
}
