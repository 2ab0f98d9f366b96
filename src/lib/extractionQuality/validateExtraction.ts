/**
 * Extraction Validator: Pure Function
 *
 * Six ordered checks over an extraction result, each with a policy weight.
 * Score = max(0, 100 − Σ failed weights); an empty extraction scores 0.
 *
 * NON-NEGOTIABLE:
 *   - No IO, no retries; re-extraction is the pipeline's decision
 *   - Same input → same report
 */

import { daysBetween, maxDate, minDate } from "@/lib/dates/isoDate";
import type { UnderwritingConfig } from "@/lib/config/types";
import { roundCents, sumCents } from "@/lib/statementModel/money";
import type { Transaction } from "@/lib/statementModel/types";
import type {
  ExtractionQualityInput,
  ExtractionQualityReport,
  QualityCheck,
  QualityCheckName,
  QualityStatus,
} from "./types";

type QualityPolicy = UnderwritingConfig["policy"]["quality"];

/** Float slack on top of the cent tolerance. */
const EPSILON = 1e-9;

function check(name: QualityCheckName, passed: boolean, detail: string, policy: QualityPolicy): QualityCheck {
  return { name, passed, detail, deduction: passed ? 0 : policy.weights[name] };
}

// ---------------------------------------------------------------------------
// Checks
// ---------------------------------------------------------------------------

function checkBalanceReconciliation(input: ExtractionQualityInput, policy: QualityPolicy): QualityCheck {
  const txns = input.transactions;
  const problems: string[] = [];
  let chained = 0;
  let breaks = 0;

  for (let i = 1; i < txns.length; i++) {
    const prior = txns[i - 1]?.runningBalance ?? null;
    const cur = txns[i];
    if (prior === null || !cur || cur.runningBalance === null) continue;
    chained++;
    if (Math.abs(prior + cur.amount - cur.runningBalance) > policy.balanceTolerance + EPSILON) breaks++;
  }
  if (breaks > 0) problems.push(`${breaks} of ${chained} running-balance step(s) do not reconcile`);

  const first = txns[0];
  if (input.openingBalance !== null && first && first.runningBalance !== null) {
    chained++;
    const expected = input.openingBalance + first.amount;
    if (Math.abs(expected - first.runningBalance) > policy.balanceTolerance + EPSILON) {
      problems.push(`opening balance ${input.openingBalance.toFixed(2)} does not lead to the first running balance`);
    }
  }

  if (input.openingBalance !== null && input.closingBalance !== null && txns.length > 0) {
    chained++;
    const net = sumCents(txns.map((t) => t.amount));
    const computed = roundCents(input.openingBalance + net);
    const tolerance =
      Math.abs(input.closingBalance) * policy.statedBalanceTolerancePct + policy.statedBalanceToleranceAbs;
    if (Math.abs(computed - input.closingBalance) > tolerance + EPSILON) {
      problems.push(
        `stated closing ${input.closingBalance.toFixed(2)} differs from opening + net ${computed.toFixed(2)}`,
      );
    }
  }

  if (chained === 0) return check("balance_reconciliation", true, "no balances printed to reconcile", policy);
  return check(
    "balance_reconciliation",
    problems.length === 0,
    problems.length === 0 ? `${chained} balance link(s) reconcile` : problems.join("; "),
    policy,
  );
}

/** Days covered by the statement: the period, else the span of dates. */
function spanDays(input: ExtractionQualityInput): number {
  if (input.period) return daysBetween(input.period.start, input.period.end);
  const dates = input.transactions.map((t) => t.date);
  const first = minDate(dates);
  const last = maxDate(dates);
  return first && last ? daysBetween(first, last) : 0;
}

function checkTransactionCount(input: ExtractionQualityInput, policy: QualityPolicy): QualityCheck {
  const expected = Math.max(1, Math.floor(spanDays(input) / policy.daysPerExpectedTransaction));
  const count = input.transactions.length;
  return check(
    "transaction_count",
    count >= expected,
    `${count} transaction(s), expected at least ${expected}`,
    policy,
  );
}

function checkCreditDebitSanity(input: ExtractionQualityInput, policy: QualityPolicy): QualityCheck {
  const credits = input.transactions.filter((t) => t.amount > 0);
  const debits = input.transactions.filter((t) => t.amount < 0);
  const creditTotal = sumCents(credits.map((t) => t.amount));
  const debitTotal = Math.abs(sumCents(debits.map((t) => t.amount)));

  const heavy = (count: number, total: number) =>
    count >= policy.oneSidedMinCount || total >= policy.oneSidedMinTotal;
  const oneSided =
    (credits.length === 0 && heavy(debits.length, debitTotal)) ||
    (debits.length === 0 && heavy(credits.length, creditTotal));

  return check(
    "credit_debit_sanity",
    !oneSided,
    `${credits.length} credit(s) totaling ${creditTotal.toFixed(2)}, ${debits.length} debit(s) totaling ${debitTotal.toFixed(2)}`,
    policy,
  );
}

const NUMERIC_ONLY = /^[\d\s.,#$/*-]*$/;

function checkDescriptionQuality(input: ExtractionQualityInput, policy: QualityPolicy): QualityCheck {
  const total = input.transactions.length;
  const bad = input.transactions.filter(
    (t) => t.description.trim().length < policy.minDescriptionLength || NUMERIC_ONLY.test(t.description),
  ).length;
  const share = total === 0 ? 0 : bad / total;
  return check(
    "description_quality",
    share <= policy.maxBadDescriptionShare,
    `${bad} of ${total} description(s) too short or numeric-only`,
    policy,
  );
}

function duplicateKey(t: Transaction): string {
  return `${t.date}|${t.description}|${t.amount.toFixed(2)}`;
}

function checkDuplicates(input: ExtractionQualityInput, policy: QualityPolicy): QualityCheck {
  const counts = new Map<string, number>();
  for (const t of input.transactions) {
    const key = duplicateKey(t);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  let surplus = 0;
  for (const n of counts.values()) surplus += n - 1;
  return check(
    "duplicates",
    surplus <= policy.allowedDuplicateSurplus,
    `${surplus} repeated (date, description, amount) row(s)`,
    policy,
  );
}

function checkDateSanity(input: ExtractionQualityInput, policy: QualityPolicy): QualityCheck {
  const { period } = input;
  const outside = input.transactions.filter((t) =>
    period
      ? t.date < period.start || t.date > period.end
      : parseInt(t.date.slice(0, 4), 10) < policy.earliestPlausibleYear,
  ).length;
  const scope = period ? `outside ${period.start}..${period.end}` : `before ${policy.earliestPlausibleYear}`;
  return check("date_sanity", outside === 0, `${outside} date(s) ${scope}`, policy);
}

// ---------------------------------------------------------------------------
// Status & recommendation
// ---------------------------------------------------------------------------

function statusFor(score: number, policy: QualityPolicy): QualityStatus {
  if (score >= policy.goodThreshold) return "GOOD";
  if (score >= policy.reviewThreshold) return "NEEDS_REVIEW";
  return "POOR";
}

function recommend(status: QualityStatus, checks: QualityCheck[], empty: boolean): string {
  if (empty) return "No transactions found; confirm the bank format or re-extract the statement.";
  const failed = checks.filter((c) => !c.passed).map((c) => c.name);
  switch (status) {
    case "GOOD":
      return failed.length === 0
        ? "Extraction is complete; proceed with analysis."
        : `Extraction is usable; spot-check ${failed.join(", ")}.`;
    case "NEEDS_REVIEW":
      return `Review ${failed.join(", ")} before relying on the analysis.`;
    case "POOR":
      return `Re-extract with a different parser or review manually (${failed.join(", ")}).`;
  }
}

// ---------------------------------------------------------------------------
// validateExtraction: pure function
// ---------------------------------------------------------------------------

export function validateExtraction(input: ExtractionQualityInput, config: UnderwritingConfig): ExtractionQualityReport {
  const policy = config.policy.quality;
  const checks: QualityCheck[] = [
    checkBalanceReconciliation(input, policy),
    checkTransactionCount(input, policy),
    checkCreditDebitSanity(input, policy),
    checkDescriptionQuality(input, policy),
    checkDuplicates(input, policy),
    checkDateSanity(input, policy),
  ];

  const empty = input.transactions.length === 0;
  const totalDeducted = checks.reduce((sum, c) => sum + c.deduction, 0);
  const score = empty ? 0 : Math.max(0, Math.round(100 - totalDeducted));
  const status = statusFor(score, policy);

  return { score, status, checks, recommendation: recommend(status, checks, empty) };
}
