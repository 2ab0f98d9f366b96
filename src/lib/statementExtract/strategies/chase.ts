/**
 * Chase business checking.
 *
 * MM/DD dates, amount at line end, separate deposit / check / withdrawal /
 * fee blocks. "CHECKS PAID" prints several checks per row
 * ("1001 ^ 01/05 250.00 1002 * ^ 01/09 75.00"). ACH detail (Trn:, Ind ID:)
 * wraps onto following lines.
 */

import { parseSectionedLayout, type SectionedLayout } from "../sectionedLayout";
import type { ExtractionStrategy } from "../types";

// First matching phrase wins.
const CHASE_LAYOUT: SectionedLayout = {
  headers: [
    { phrase: "DAILY ENDING BALANCE", kind: "stop" },
    { phrase: "SERVICE CHARGE SUMMARY", kind: "stop" },
    { phrase: "CHECKS PAID", kind: "checks" },
    { phrase: "ATM & DEBIT CARD WITHDRAWALS", kind: "debit" },
    { phrase: "ELECTRONIC WITHDRAWALS", kind: "debit" },
    { phrase: "OTHER WITHDRAWALS", kind: "debit" },
    { phrase: "FEES", kind: "debit" },
    { phrase: "DEPOSITS AND ADDITIONS", kind: "credit" },
    { phrase: "DEPOSITS AND CREDITS", kind: "credit" },
  ],
  checkRow: {
    pattern: /(\d{3,6})\s*\*?\s*\^?\s*(\d{2}\/\d{2})\s+(\$?[\d,]+\.\d{2})/g,
    groups: { number: 1, date: 2, amount: 3 },
  },
};

export const extractChase: ExtractionStrategy = (ctx) => ({
  transactions: parseSectionedLayout(ctx, CHASE_LAYOUT),
  sortByDate: true,
});
