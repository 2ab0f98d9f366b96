/**
 * Generic fallback.
 *
 * Tables first, then text. A text transaction is a line that starts with a
 * date token and ends with one or more amount tokens (amount, optional
 * DR/CR marker, optional running balance). A few layouts print the amount
 * right after the date instead; those are read too.
 */

import {
  BalanceTracker,
  appendContinuation,
  cleanDescription,
  isContinuationLine,
  reportMalformed,
  resolveSignedAmount,
  type DebitCreditMarker,
} from "../lineHelpers";
import { parseTableTransactions } from "../tableRows";
import { leadingDateToken, parseAmount, parseDateToken, type ParsedAmount } from "../tokens";
import type { ExtractionStrategy, StrategyContext, TransactionDraft } from "../types";

interface TrailingAmount {
  amount: ParsedAmount;
  marker: DebitCreditMarker | null;
}

const MARKER = /^(DR|CR)$/i;
const MAX_TRAILING_TOKENS = 5;
const MAX_CONTINUATION_LENGTH = 120;

/** Split "desc 1,200.00 DR 3,800.00" into description and trailing amounts. */
function splitTrailing(tokens: string[]): { description: string[]; trailing: TrailingAmount[] } {
  let cut = tokens.length;
  while (cut > 0 && tokens.length - cut < MAX_TRAILING_TOKENS) {
    const token = tokens[cut - 1] ?? "";
    if (parseAmount(token) === null && !MARKER.test(token) && token !== "$") break;
    cut--;
  }

  const trailing: TrailingAmount[] = [];
  for (const token of tokens.slice(cut)) {
    const marker = MARKER.exec(token);
    const prev = trailing[trailing.length - 1];
    if (marker && marker[1]) {
      if (prev) prev.marker = marker[1].toUpperCase() === "DR" ? "DR" : "CR";
      continue;
    }
    const amount = parseAmount(token);
    if (amount) trailing.push({ amount, marker: null });
  }
  return { description: tokens.slice(0, cut), trailing };
}

function parseTextLines(ctx: StrategyContext): TransactionDraft[] {
  const out: TransactionDraft[] = [];
  const balance = new BalanceTracker(ctx.openingBalance);
  let last: TransactionDraft | null = null;

  for (const line of ctx.lines) {
    if (line.text.length === 0) {
      // A blank line ends any wrapped description.
      last = null;
      continue;
    }

    const token = leadingDateToken(line.text);
    if (!token) {
      if (last && isContinuationLine(line.text) && line.text.length <= MAX_CONTINUATION_LENGTH) {
        appendContinuation(last, line.text);
      }
      continue;
    }
    last = null;

    const tokens = line.text.slice(token.length).trim().split(" ").filter((t) => t.length > 0);
    let { description, trailing } = splitTrailing(tokens);

    // "<date> <amount> <description>"
    const leading = tokens[0] ? parseAmount(tokens[0]) : null;
    if (trailing.length === 0 && leading) {
      trailing = [{ amount: leading, marker: null }];
      description = tokens.slice(1);
    }
    if (trailing.length === 0) {
      if (/\d\.\d{2}\b/.test(line.text)) reportMalformed(ctx, line, "unreadable amount");
      continue;
    }

    const date = parseDateToken(token, ctx);
    const text = cleanDescription(description.join(" "));
    if (!date || text.length === 0) {
      reportMalformed(ctx, line, date ? "missing description" : "unreadable date");
      continue;
    }

    const main = trailing.length >= 2 ? trailing[trailing.length - 2] : trailing[0];
    const balanceToken = trailing.length >= 2 ? trailing[trailing.length - 1] : undefined;
    if (!main) continue;
    const runningBalance = balanceToken
      ? (balanceToken.amount.sign ?? 1) * balanceToken.amount.magnitude
      : null;

    const signed = resolveSignedAmount({
      amount: main.amount,
      marker: main.marker,
      description: text,
      priorBalance: balance.current,
      balance: runningBalance,
    });
    balance.advance(signed, runningBalance);

    last = { date, description: text, amount: signed, runningBalance, sourceLineRef: { kind: "text", line: line.line } };
    out.push(last);
  }
  return out;
}

export const extractGeneric: ExtractionStrategy = (ctx) => {
  if (ctx.tables.length > 0) {
    const fromTables = parseTableTransactions(ctx);
    if (fromTables.length > 0) return { transactions: fromTables, sortByDate: false };
  }
  return { transactions: parseTextLines(ctx), sortByDate: false };
};
