/**
 * Statement Extract: Token Parsing
 *
 * Amount and date tokens as printed by bank statements. Everything here is
 * pure; callers decide what an unparsable token means for the line.
 */

import { isoDate, parseIsoDate } from "@/lib/dates/isoDate";
import type { StatementPeriod } from "@/lib/statementModel/types";

// ---------------------------------------------------------------------------
// Amounts
// ---------------------------------------------------------------------------

export interface ParsedAmount {
  magnitude: number;
  /** Sign printed with the token; null when the token is unsigned */
  sign: 1 | -1 | null;
}

const AMOUNT_BODY = /^(?:\d{1,3}(?:,\d{3})+|\d+)\.\d{2}$/;

/**
 * Parse "$1,234.56", "(1,234.56)", "1,234.56-", "-$1,234.56", "+12.00"
 * and the "<" debit marker ("85.00<").
 */
export function parseAmount(token: string): ParsedAmount | null {
  let s = token.trim();
  let sign: 1 | -1 | null = null;

  if (s.endsWith("<")) {
    sign = -1;
    s = s.slice(0, -1).trim();
  }
  if (s.startsWith("(") && s.endsWith(")")) {
    sign = -1;
    s = s.slice(1, -1);
  }
  if (s.endsWith("-")) {
    sign = -1;
    s = s.slice(0, -1);
  }
  if (s.startsWith("-")) {
    sign = -1;
    s = s.slice(1);
  } else if (s.startsWith("+")) {
    sign = 1;
    s = s.slice(1);
  }
  if (s.startsWith("$")) s = s.slice(1);
  if (s.startsWith("-")) {
    sign = -1;
    s = s.slice(1);
  }

  if (!AMOUNT_BODY.test(s)) return null;
  const magnitude = parseFloat(s.replace(/,/g, ""));
  if (!Number.isFinite(magnitude)) return null;
  return { magnitude, sign };
}

export function isAmountToken(token: string): boolean {
  return parseAmount(token) !== null;
}

/** True when the line carries anything shaped like a printed amount. */
export function containsAmount(text: string): boolean {
  return text.split(/\s+/).some(isAmountToken);
}

// ---------------------------------------------------------------------------
// Dates
// ---------------------------------------------------------------------------

const MONTHS: Record<string, number> = {
  jan: 1, january: 1,
  feb: 2, february: 2,
  mar: 3, march: 3,
  apr: 4, april: 4,
  may: 5,
  jun: 6, june: 6,
  jul: 7, july: 7,
  aug: 8, august: 8,
  sep: 9, sept: 9, september: 9,
  oct: 10, october: 10,
  nov: 11, november: 11,
  dec: 12, december: 12,
};

export function monthFromName(name: string): number | null {
  return MONTHS[name.toLowerCase().replace(/\.$/, "")] ?? null;
}

export interface YearContext {
  period: StatementPeriod | null;
  fallbackYear: number;
}

/**
 * Year for a month printed without one: the period's start year, rolled
 * forward when the month falls before the period's start month
 * (a Dec 15 – Jan 14 statement puts January in the following year).
 */
export function resolveYear(month: number, ctx: YearContext): number {
  if (!ctx.period) return ctx.fallbackYear;
  const start = parseIsoDate(ctx.period.start);
  return month < start.month ? start.year + 1 : start.year;
}

function expandYear(raw: string): number {
  const n = parseInt(raw, 10);
  return raw.length === 2 ? 2000 + n : n;
}

const SLASH_DATE = /^(\d{1,2})\/(\d{1,2})(?:\/(\d{2}|\d{4}))?$/;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const NAME_DATE = /^([A-Za-z]{3,9}\.?)\s+(\d{1,2}),?(?:\s+(\d{4}))?$/;

/** Parse a date token into an ISO date, inferring the year when absent. */
export function parseDateToken(token: string, ctx: YearContext): string | null {
  const t = token.trim();

  const slash = SLASH_DATE.exec(t);
  if (slash) {
    const month = parseInt(slash[1] ?? "", 10);
    const day = parseInt(slash[2] ?? "", 10);
    const year = slash[3] ? expandYear(slash[3]) : resolveYear(month, ctx);
    return isoDate(year, month, day);
  }

  const iso = ISO_DATE.exec(t);
  if (iso) {
    return isoDate(parseInt(iso[1] ?? "", 10), parseInt(iso[2] ?? "", 10), parseInt(iso[3] ?? "", 10));
  }

  const named = NAME_DATE.exec(t);
  if (named) {
    const month = monthFromName(named[1] ?? "");
    if (month === null) return null;
    const day = parseInt(named[2] ?? "", 10);
    const year = named[3] ? parseInt(named[3], 10) : resolveYear(month, ctx);
    return isoDate(year, month, day);
  }

  return null;
}

/** Leading date token of a line, as printed, or null. */
const LEADING_DATE = /^(\d{1,2}\/\d{1,2}(?:\/\d{2,4})?|\d{4}-\d{2}-\d{2}|[A-Za-z]{3,9}\.?\s+\d{1,2}(?:,\s*\d{4})?)(?=\s|$)/;

export function leadingDateToken(line: string): string | null {
  const m = LEADING_DATE.exec(line);
  if (!m || !m[1]) return null;
  // "Total 12" and friends look like "Mon DD"; only real month names count.
  if (/^[A-Za-z]/.test(m[1])) {
    const word = m[1].split(/\s+/)[0] ?? "";
    if (monthFromName(word) === null) return null;
  }
  return m[1];
}
