/**
 * U.S. Bank business checking.
 *
 * "Mon DD" dates, withdrawals carry a trailing minus ("1,194.31-"),
 * REF= lines continue the previous item. Checks Presented prints
 * "check# date ref# amount" groups side by side.
 */

import { parseSectionedLayout, type SectionedLayout } from "../sectionedLayout";
import type { ExtractionStrategy } from "../types";

const US_BANK_LAYOUT: SectionedLayout = {
  headers: [
    { phrase: "BALANCE SUMMARY", kind: "stop" },
    { phrase: "CHECKS PRESENTED", kind: "checks" },
    { phrase: "WITHDRAWALS", kind: "debit" },
    { phrase: "DEPOSITS", kind: "credit" },
  ],
  checkRow: {
    pattern: /(\d{3,6})\*?\s+([A-Za-z]{3}\s+\d{1,2})\s+(?:\d{5,}\s+)?(\$?[\d,]+\.\d{2})/g,
    groups: { number: 1, date: 2, amount: 3 },
  },
};

export const extractUsBank: ExtractionStrategy = (ctx) => ({
  transactions: parseSectionedLayout(ctx, US_BANK_LAYOUT),
  sortByDate: true,
});
