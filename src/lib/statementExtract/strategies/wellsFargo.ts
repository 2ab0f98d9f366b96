/**
 * Wells Fargo.
 *
 * Two layouts:
 * - Columnar ("Deposits/Credits | Withdrawals/Debits | Ending daily balance"):
 *   the ending daily balance is printed only on the last item of a day, so
 *   the sign comes from the balance delta tracked across items.
 * - Formal: amount first, "<" marks a debit, date inside the description,
 *   separate credit/debit blocks.
 */

import {
  BalanceTracker,
  appendContinuation,
  cleanDescription,
  isContinuationLine,
  reportMalformed,
  resolveSignedAmount,
} from "../lineHelpers";
import { parseSectionedLayout, type LineParse, type SectionedLayout } from "../sectionedLayout";
import { leadingDateToken, parseAmount, parseDateToken } from "../tokens";
import type { ExtractionStrategy, StrategyContext, TransactionDraft } from "../types";

const COLUMNAR_HEADER = /Deposits\s*\/\s*Credits[\s\S]*Withdrawals\s*\/\s*Debits|Withdrawals\s*\/\s*Debits[\s\S]*Deposits\s*\/\s*Credits/i;

// ---------------------------------------------------------------------------
// Columnar
// ---------------------------------------------------------------------------

const COLUMNAR_LINE = /^(\d{1,2}\/\d{1,2}(?:\/\d{2,4})?)\s+(.+?)\s+(\$?[\d,]+\.\d{2})(?:\s+(\$?-?[\d,]+\.\d{2}))?$/;

function parseColumnar(ctx: StrategyContext): TransactionDraft[] {
  const out: TransactionDraft[] = [];
  const balance = new BalanceTracker(ctx.openingBalance);
  let last: TransactionDraft | null = null;

  for (const line of ctx.lines) {
    if (line.text.length === 0) continue;
    const m = COLUMNAR_LINE.exec(line.text);
    if (!m) {
      if (leadingDateToken(line.text) !== null) {
        last = null;
        continue;
      }
      if (last && isContinuationLine(line.text)) appendContinuation(last, line.text);
      continue;
    }

    const date = parseDateToken(m[1] ?? "", ctx);
    const amount = parseAmount(m[3] ?? "");
    const printed = m[4] ? parseAmount(m[4]) : null;
    if (!date || !amount) {
      reportMalformed(ctx, line, "unreadable date or amount");
      last = null;
      continue;
    }
    const runningBalance = printed ? (printed.sign ?? 1) * printed.magnitude : null;
    const description = cleanDescription(m[2] ?? "");
    const signed = resolveSignedAmount({
      amount,
      description,
      priorBalance: balance.current,
      balance: runningBalance,
    });
    balance.advance(signed, runningBalance);

    last = { date, description, amount: signed, runningBalance, sourceLineRef: { kind: "text", line: line.line } };
    out.push(last);
  }
  return out;
}

// ---------------------------------------------------------------------------
// Formal
// ---------------------------------------------------------------------------

const FORMAL_LINE = /^(\$?[\d,]+\.\d{2})\s*(<)?\s+(.+)$/;
const EMBEDDED_DATE = /\b(\d{1,2}\/\d{1,2})\b/;

function parseFormalLine(text: string, ctx: StrategyContext): LineParse {
  const m = FORMAL_LINE.exec(text);
  if (!m) return null;
  const amount = parseAmount(m[1] ?? "");
  const rest = m[3] ?? "";
  const dateMatch = EMBEDDED_DATE.exec(rest);
  const date = dateMatch && dateMatch[1] ? parseDateToken(dateMatch[1], ctx) : null;
  if (!amount || !date || !dateMatch) return "malformed";
  const description = cleanDescription(rest.replace(dateMatch[0], " "));
  return {
    date,
    description,
    amount: m[2] === "<" ? { magnitude: amount.magnitude, sign: -1 } : amount,
  };
}

const FORMAL_LAYOUT: SectionedLayout = {
  headers: [
    { phrase: "DAILY BALANCE SUMMARY", kind: "stop" },
    { phrase: "WITHDRAWALS", kind: "debit" },
    { phrase: "DEBITS", kind: "debit" },
    { phrase: "CHECKS", kind: "debit" },
    { phrase: "DEPOSITS", kind: "credit" },
    { phrase: "CREDITS", kind: "credit" },
  ],
  parseLine: parseFormalLine,
};

export const extractWellsFargo: ExtractionStrategy = (ctx) => {
  const text = ctx.lines.map((l) => l.text).join("\n");
  if (COLUMNAR_HEADER.test(text)) {
    return { transactions: parseColumnar(ctx), sortByDate: false };
  }
  return { transactions: parseSectionedLayout(ctx, FORMAL_LAYOUT), sortByDate: true };
};
