/**
 * Statement Extract: Sectioned Layouts
 *
 * Layouts that print deposits, withdrawals and checks in separate blocks.
 * The block header decides the sign for every item beneath it; per-line
 * signs are often missing from these layouts.
 */

import {
  appendContinuation,
  cleanDescription,
  isContinuationLine,
  isTotalLine,
  matchSectionHeader,
  reportMalformed,
  type SectionHeader,
  type SectionKind,
} from "./lineHelpers";
import { containsAmount, leadingDateToken, parseAmount, parseDateToken, type ParsedAmount } from "./tokens";
import type { SourceLine, StrategyContext, TransactionDraft } from "./types";

export interface DatedItem {
  date: string;
  description: string;
  amount: ParsedAmount;
}

export type LineParse = DatedItem | "malformed" | null;

/**
 * "<date> <description> <amount>". Returns null for lines that are not
 * transaction-shaped and "malformed" when a date-led line carries an amount
 * that cannot be read.
 */
export function parseDatedTrailingAmount(text: string, ctx: StrategyContext): LineParse {
  const token = leadingDateToken(text);
  if (!token) return null;
  const rest = text.slice(token.length).trim();
  const tokens = rest.split(" ").filter((t) => t.length > 0);

  const lastToken = tokens[tokens.length - 1];
  const amount = lastToken ? parseAmount(lastToken) : null;
  if (!amount) return containsAmount(rest) ? "malformed" : null;
  tokens.pop();
  if (tokens[tokens.length - 1] === "$") tokens.pop();

  const date = parseDateToken(token, ctx);
  const description = cleanDescription(tokens.join(" "));
  if (!date || description.length === 0) return "malformed";
  return { date, description, amount };
}

export interface CheckRowPattern {
  /** Must carry the g flag; every match is one check */
  pattern: RegExp;
  groups: { number: number; date: number; amount: number };
}

/** Split a row of side-by-side checks into one draft per check. */
export function parseCheckRow(line: SourceLine, ctx: StrategyContext, row: CheckRowPattern): TransactionDraft[] {
  const drafts: TransactionDraft[] = [];
  for (const m of line.text.matchAll(row.pattern)) {
    const number = m[row.groups.number];
    const date = parseDateToken(m[row.groups.date] ?? "", ctx);
    const amount = parseAmount(m[row.groups.amount] ?? "");
    if (!number || !date || !amount) {
      reportMalformed(ctx, line, "unreadable check entry");
      continue;
    }
    drafts.push({
      date,
      description: `CHECK #${number}`,
      amount: -amount.magnitude,
      runningBalance: null,
      sourceLineRef: { kind: "text", line: line.line },
    });
  }
  return drafts;
}

export interface SectionedLayout {
  headers: SectionHeader[];
  checkRow?: CheckRowPattern;
  parseLine?: (text: string, ctx: StrategyContext) => LineParse;
}

function signFor(kind: Exclude<SectionKind, "stop">, amount: ParsedAmount): number {
  // A printed minus inside a deposit block still means money out.
  if (kind === "credit" && amount.sign !== -1) return amount.magnitude;
  return -amount.magnitude;
}

export function parseSectionedLayout(ctx: StrategyContext, layout: SectionedLayout): TransactionDraft[] {
  const parseLine = layout.parseLine ?? parseDatedTrailingAmount;
  const out: TransactionDraft[] = [];
  let section: Exclude<SectionKind, "stop"> | null = null;
  let last: TransactionDraft | null = null;

  for (const line of ctx.lines) {
    const text = line.text;
    if (text.length === 0) continue;

    const header = matchSectionHeader(text, layout.headers);
    if (header !== null) {
      section = header === "stop" ? null : header;
      last = null;
      continue;
    }
    if (section === null) continue;
    if (isTotalLine(text)) {
      last = null;
      continue;
    }

    if (section === "checks" && layout.checkRow) {
      const checks = parseCheckRow(line, ctx, layout.checkRow);
      if (checks.length > 0) {
        out.push(...checks);
        last = null;
        continue;
      }
    }

    const parsed = parseLine(text, ctx);
    if (parsed === "malformed") {
      reportMalformed(ctx, line, "unreadable date or amount");
      last = null;
      continue;
    }
    if (parsed !== null) {
      last = {
        date: parsed.date,
        description: parsed.description,
        amount: signFor(section, parsed.amount),
        runningBalance: null,
        sourceLineRef: { kind: "text", line: line.line },
      };
      out.push(last);
      continue;
    }

    if (last && isContinuationLine(text)) appendContinuation(last, text);
  }

  return out;
}
