/**
 * Statement Extract: Line Helpers
 *
 * Boilerplate filtering, section headers, continuation lines and sign
 * resolution shared by the per-bank strategies.
 */

import { roundCents } from "@/lib/statementModel/money";
import { containsAmount, leadingDateToken, type ParsedAmount } from "./tokens";
import type { SourceLine, StrategyContext, TransactionDraft } from "./types";

// ---------------------------------------------------------------------------
// Boilerplate
// ---------------------------------------------------------------------------

const PAGE_BOILERPLATE: RegExp[] = [
  /^Page\s+\d+(?:\s+of\s+\d+)?$/i,
  /\bPage\s+\d+\s+of\s+\d+$/i,
  /^\d+\s+of\s+\d+$/,
  /^\*(?:start|end)\*/i,
  /^\(?continued\)?$/i,
  /^Member\s+FDIC\b/i,
  /^Equal\s+Housing\s+Lender\b/i,
];

export function isBoilerplate(text: string): boolean {
  return PAGE_BOILERPLATE.some((p) => p.test(text));
}

/** Split raw text into trimmed source lines with page boilerplate removed. */
export function toSourceLines(text: string): SourceLine[] {
  const out: SourceLine[] = [];
  text.split(/\r?\n/).forEach((raw, i) => {
    const trimmed = raw.trim().replace(/\s+/g, " ");
    if (trimmed.length > 0 && isBoilerplate(trimmed)) return;
    out.push({ text: trimmed, line: i + 1 });
  });
  return out;
}

// ---------------------------------------------------------------------------
// Sections
// ---------------------------------------------------------------------------

export type SectionKind = "credit" | "debit" | "checks" | "stop";

export interface SectionHeader {
  phrase: string;
  kind: SectionKind;
}

/**
 * A header is a line with no leading date and no amount that contains one
 * of the phrases. First phrase in list order wins.
 */
export function matchSectionHeader(text: string, headers: SectionHeader[]): SectionKind | null {
  if (leadingDateToken(text) !== null || containsAmount(text)) return null;
  if (/^Total\b/i.test(text)) return null;
  const upper = text.toUpperCase();
  for (const h of headers) {
    if (upper.includes(h.phrase)) return h.kind;
  }
  return null;
}

export function isTotalLine(text: string): boolean {
  return /^(?:Total|Subtotal)\b/i.test(text);
}

// ---------------------------------------------------------------------------
// Continuations
// ---------------------------------------------------------------------------

const MAX_DESCRIPTION = 300;

export function isContinuationLine(text: string): boolean {
  return text.length > 0 && leadingDateToken(text) === null && !containsAmount(text);
}

export function appendContinuation(draft: TransactionDraft, text: string): void {
  draft.description = `${draft.description} ${text}`.slice(0, MAX_DESCRIPTION);
}

export function cleanDescription(text: string): string {
  return text.replace(/\s+/g, " ").trim().slice(0, MAX_DESCRIPTION);
}

// ---------------------------------------------------------------------------
// Sign resolution
// ---------------------------------------------------------------------------

const CREDIT_HINT =
  /\b(?:DEPOSIT|EDEPOSIT|CREDIT|REFUND|TRANSFER\s+FROM|WIRE\s+(?:IN|FROM)|INCOMING\s+WIRE|INTEREST\s+PAID)\b/i;
const DEBIT_HINT =
  /\b(?:WITHDRAWAL|DEBIT|PURCHASE|PAYMENT|PMT|CHECK|CHK|FEE|ATM|POS|BILL\s*PAY|WIRE\s+OUT|TRANSFER\s+TO)\b/i;

const BALANCE_EPSILON = 0.005;

export type DebitCreditMarker = "DR" | "CR";

export interface SignInput {
  amount: ParsedAmount;
  description: string;
  marker?: DebitCreditMarker | null;
  priorBalance?: number | null;
  balance?: number | null;
  /** Used when no other evidence decides */
  defaultSign?: 1 | -1;
}

/**
 * Signed amount from, in order: DR/CR marker, printed sign, running
 * balance delta, description keywords, default.
 */
export function resolveSignedAmount(input: SignInput): number {
  const { magnitude, sign } = input.amount;
  if (input.marker === "DR") return -magnitude;
  if (input.marker === "CR") return magnitude;
  if (sign !== null) return sign * magnitude;

  const prior = input.priorBalance ?? null;
  const balance = input.balance ?? null;
  if (prior !== null && balance !== null) {
    if (Math.abs(prior + magnitude - balance) < BALANCE_EPSILON) return magnitude;
    if (Math.abs(prior - magnitude - balance) < BALANCE_EPSILON) return -magnitude;
  }

  if (CREDIT_HINT.test(input.description)) return magnitude;
  if (DEBIT_HINT.test(input.description)) return -magnitude;
  return (input.defaultSign ?? 1) * magnitude;
}

/** Tracks the last known balance as transactions are appended in order. */
export class BalanceTracker {
  private known: number | null;

  constructor(opening: number | null) {
    this.known = opening;
  }

  get current(): number | null {
    return this.known;
  }

  reset(balance: number): void {
    this.known = balance;
  }

  advance(amount: number, printedBalance: number | null): void {
    if (printedBalance !== null) this.known = printedBalance;
    else if (this.known !== null) this.known = roundCents(this.known + amount);
  }
}

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

export function reportMalformed(ctx: StrategyContext, line: SourceLine, reason: string): void {
  ctx.diagnostics.push({
    code: "MALFORMED_LINE",
    ref: { kind: "text", line: line.line },
    detail: `${reason}: ${line.text.slice(0, 120)}`,
  });
}

export function signedMagnitude(magnitude: number, kind: "credit" | "debit" | "checks"): number {
  return kind === "credit" ? magnitude : -magnitude;
}
