/**
 * Citibank (CitiBusiness).
 *
 * One chronological CHECKING ACTIVITY block: date, description, the amount
 * in a debit or credit column, then the running balance. Column position is
 * lost in extracted text, so the sign comes from the balance delta.
 */

import {
  BalanceTracker,
  appendContinuation,
  cleanDescription,
  isContinuationLine,
  isTotalLine,
  reportMalformed,
  resolveSignedAmount,
} from "../lineHelpers";
import { parseAmount, parseDateToken } from "../tokens";
import type { ExtractionStrategy, TransactionDraft } from "../types";

const ACTIVITY_START = /CHECKING ACTIVITY/i;
const ACTIVITY_END = /^(?:CHECKING SUMMARY|SAVINGS ACTIVITY|CUSTOMER SERVICE INFORMATION)\b/i;
const ACTIVITY_LINE = /^(\d{2}\/\d{2})\s+(.+?)\s+(\$?[\d,]+\.\d{2})(?:\s+(\$?-?[\d,]+\.\d{2}))?$/;
const OPENING_ROW = /\b(?:BEGINNING|OPENING)\s+BALANCE\b/i;
const CHECK_ROW = /^CHECK\b/i;

export const extractCitibank: ExtractionStrategy = (ctx) => {
  const out: TransactionDraft[] = [];
  const balance = new BalanceTracker(ctx.openingBalance);
  let inActivity = false;
  let last: TransactionDraft | null = null;

  for (const line of ctx.lines) {
    const text = line.text;
    if (text.length === 0) continue;
    if (ACTIVITY_START.test(text)) {
      inActivity = true;
      continue;
    }
    if (!inActivity) continue;
    if (ACTIVITY_END.test(text)) {
      inActivity = false;
      last = null;
      continue;
    }
    if (isTotalLine(text)) continue;

    const m = ACTIVITY_LINE.exec(text);
    if (!m) {
      if (last && isContinuationLine(text)) appendContinuation(last, text);
      continue;
    }

    const description = cleanDescription(m[2] ?? "");
    const first = parseAmount(m[3] ?? "");
    const second = m[4] ? parseAmount(m[4]) : null;

    if (OPENING_ROW.test(description)) {
      const opening = second ?? first;
      if (opening) balance.reset((opening.sign ?? 1) * opening.magnitude);
      last = null;
      continue;
    }

    const date = parseDateToken(m[1] ?? "", ctx);
    if (!date || !first) {
      reportMalformed(ctx, line, "unreadable date or amount");
      last = null;
      continue;
    }

    const runningBalance = second ? (second.sign ?? 1) * second.magnitude : null;
    const signed = CHECK_ROW.test(description)
      ? -first.magnitude
      : resolveSignedAmount({
          amount: first,
          description,
          priorBalance: balance.current,
          balance: runningBalance,
          defaultSign: -1,
        });
    balance.advance(signed, runningBalance);

    last = { date, description, amount: signed, runningBalance, sourceLineRef: { kind: "text", line: line.line } };
    out.push(last);
  }

  return { transactions: out, sortByDate: false };
};
