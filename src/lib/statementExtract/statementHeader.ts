/**
 * Statement Extract: Header Reading
 *
 * Statement period, stated opening/closing balances and the fallback year,
 * read from the raw text before any strategy runs.
 */

import { daysBetween } from "@/lib/dates/isoDate";
import type { StatementPeriod } from "@/lib/statementModel/types";
import { parseAmount, parseDateToken } from "./tokens";

export interface StatementHeader {
  period: StatementPeriod | null;
  openingBalance: number | null;
  closingBalance: number | null;
  /** Year used for month/day dates when no period is printed */
  fallbackYear: number;
}

const RANGE_JOINER = String.raw`\s*(?:-|to|through|thru)\s*`;
const SLASH = String.raw`\d{1,2}\/\d{1,2}\/(?:\d{4}|\d{2})`;
const NAMED = String.raw`[A-Za-z]{3,9}\.?\s+\d{1,2},?\s+\d{4}`;

const PERIOD_PATTERNS: RegExp[] = [
  new RegExp(`(${SLASH})${RANGE_JOINER}(${SLASH})`, "i"),
  new RegExp(`(${NAMED})${RANGE_JOINER}(${NAMED})`, "i"),
];

/** Longest span accepted as a single statement period. */
const MAX_PERIOD_DAYS = 400;

export function extractStatementPeriod(text: string): StatementPeriod | null {
  const noYear = { period: null, fallbackYear: 2000 };
  for (const pattern of PERIOD_PATTERNS) {
    const m = pattern.exec(text);
    if (!m || !m[1] || !m[2]) continue;
    // Both ends carry their year, so the fallback is never consulted.
    const start = parseDateToken(m[1], noYear);
    const end = parseDateToken(m[2], noYear);
    if (!start || !end) continue;
    const span = daysBetween(start, end);
    if (span < 0 || span > MAX_PERIOD_DAYS) continue;
    return { start, end };
  }
  return null;
}

function lastAmountOnLine(line: string): number | null {
  let found: number | null = null;
  for (const token of line.split(/\s+/)) {
    const parsed = parseAmount(token);
    if (parsed) found = parsed.sign === -1 ? -parsed.magnitude : parsed.magnitude;
  }
  return found;
}

function statedBalance(lines: string[], label: RegExp): number | null {
  for (const line of lines) {
    if (!label.test(line)) continue;
    const amount = lastAmountOnLine(line);
    if (amount !== null) return amount;
  }
  return null;
}

function firstPlausibleYear(text: string): number | null {
  const m = /\b(20\d{2})\b/.exec(text);
  return m && m[1] ? parseInt(m[1], 10) : null;
}

export function readStatementHeader(text: string, now: Date = new Date()): StatementHeader {
  const lines = text.split(/\r?\n/);
  const period = extractStatementPeriod(text);
  return {
    period,
    openingBalance: statedBalance(lines, /\b(?:Beginning|Opening|Starting)\s+Balance\b/i),
    closingBalance: statedBalance(lines, /\b(?:Ending|Closing)\s+Balance\b/i),
    fallbackYear: period ? parseInt(period.end.slice(0, 4), 10) : firstPlausibleYear(text) ?? now.getUTCFullYear(),
  };
}
