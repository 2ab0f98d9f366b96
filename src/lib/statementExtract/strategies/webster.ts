/**
 * Webster Bank.
 *
 * Formal statements print MM/DD/YYYY, the amount (debits as "-$") and the
 * balance. The online activity export prints "Mon DD", a signed amount and
 * the balance. Both are chronological.
 */

import { BalanceTracker, cleanDescription, reportMalformed, resolveSignedAmount } from "../lineHelpers";
import { parseAmount, parseDateToken } from "../tokens";
import type { ExtractionStrategy, StrategyContext, TransactionDraft } from "../types";

const FORMAL_LINE = /^(\d{2}\/\d{2}\/\d{4})\s+(.+?)\s+(-?\$?-?[\d,]+\.\d{2})\s+(\$?-?[\d,]+\.\d{2})$/;
const ACTIVITY_LINE = /^([A-Za-z]{3}\s+\d{1,2})\s+(.+?)\s+([-+]?\$?[\d,]+\.\d{2})\s+(\$?-?[\d,]+\.\d{2})$/;

function parseBalanced(ctx: StrategyContext, pattern: RegExp): TransactionDraft[] {
  const out: TransactionDraft[] = [];
  const balance = new BalanceTracker(ctx.openingBalance);

  for (const line of ctx.lines) {
    const m = pattern.exec(line.text);
    if (!m) continue;

    const date = parseDateToken(m[1] ?? "", ctx);
    const amount = parseAmount(m[3] ?? "");
    const printed = parseAmount(m[4] ?? "");
    if (!date || !amount || !printed) {
      reportMalformed(ctx, line, "unreadable date or amount");
      continue;
    }

    const description = cleanDescription(m[2] ?? "");
    const runningBalance = (printed.sign ?? 1) * printed.magnitude;
    const signed = resolveSignedAmount({
      amount,
      description,
      priorBalance: balance.current,
      balance: runningBalance,
    });
    balance.advance(signed, runningBalance);
    out.push({ date, description, amount: signed, runningBalance, sourceLineRef: { kind: "text", line: line.line } });
  }
  return out;
}

export const extractWebster: ExtractionStrategy = (ctx) => {
  const formal = ctx.lines.some((l) => FORMAL_LINE.test(l.text));
  return {
    transactions: parseBalanced(ctx, formal ? FORMAL_LINE : ACTIVITY_LINE),
    sortByDate: false,
  };
};
