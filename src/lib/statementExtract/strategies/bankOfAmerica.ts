/**
 * Bank of America business statements.
 *
 * MM/DD/YY dates, debits printed negative, blocks for deposits,
 * withdrawals, checks and service fees. The checks block prints two or
 * three "date check# amount" triples per row.
 */

import { parseSectionedLayout, type SectionedLayout } from "../sectionedLayout";
import type { ExtractionStrategy } from "../types";

const BOFA_LAYOUT: SectionedLayout = {
  headers: [
    { phrase: "DAILY LEDGER BALANCES", kind: "stop" },
    { phrase: "SERVICE FEES", kind: "debit" },
    { phrase: "WITHDRAWALS AND OTHER DEBITS", kind: "debit" },
    { phrase: "CHECKS", kind: "checks" },
    { phrase: "DEPOSITS AND OTHER CREDITS", kind: "credit" },
  ],
  checkRow: {
    pattern: /(\d{2}\/\d{2}\/\d{2})\s+(\d{3,6})\*?\s+(-?\$?[\d,]+\.\d{2})/g,
    groups: { number: 2, date: 1, amount: 3 },
  },
};

export const extractBankOfAmerica: ExtractionStrategy = (ctx) => ({
  transactions: parseSectionedLayout(ctx, BOFA_LAYOUT),
  sortByDate: true,
});
