/**
 * Position Engine: Payment Frequency
 *
 * Counts payments per calendar month, scales each month to a full month by
 * how many of its days the statement covers, and classifies the median
 * rate. A skipped or doubled payment moves one month's count by one
 * (1, 8, 22, 29 still reads weekly). A month with three payments fits both
 * weekly and biweekly schedules; the median gap between payments decides.
 *
 * Pure functions.
 */

import { daysBetween, daysInMonth, eachDay, maxDate, minDate, monthKey, parseIsoDate } from "@/lib/dates/isoDate";
import type { UnderwritingConfig } from "@/lib/config/types";
import type { StatementPeriod } from "@/lib/statementModel/types";
import type { PaymentFrequency } from "./types";

type PositionPolicy = UnderwritingConfig["policy"]["positions"];

export function median(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  return sorted.length % 2 === 1 ? upper : ((sorted[mid - 1] ?? 0) + upper) / 2;
}

/** Coverage widened to include every payment date. */
function paymentWindow(dates: readonly string[], coverage: StatementPeriod | null): StatementPeriod | null {
  const all = coverage ? [...dates, coverage.start, coverage.end] : [...dates];
  const start = minDate(all);
  const end = maxDate(all);
  return start && end ? { start, end } : null;
}

/** Payments per full month, one entry per month with enough coverage. */
export function monthlyPaymentRates(
  dates: readonly string[],
  coverage: StatementPeriod | null,
  minCoveredDays: number,
): number[] {
  const window = paymentWindow(dates, coverage);
  if (!window) return [];

  const covered = new Map<string, number>();
  for (const day of eachDay(window.start, window.end)) {
    const key = monthKey(day);
    covered.set(key, (covered.get(key) ?? 0) + 1);
  }
  const counts = new Map<string, number>();
  for (const d of dates) counts.set(monthKey(d), (counts.get(monthKey(d)) ?? 0) + 1);

  const rates: { rate: number; days: number }[] = [];
  for (const [month, days] of covered) {
    const { year, month: m } = parseIsoDate(`${month}-01`);
    rates.push({ rate: ((counts.get(month) ?? 0) * daysInMonth(year, m)) / days, days });
  }
  const eligible = rates.filter((r) => r.days >= minCoveredDays);
  return (eligible.length > 0 ? eligible : rates).map((r) => r.rate);
}

export function frequencyFromRate(rate: number, policy: PositionPolicy): PaymentFrequency {
  const bands = policy.frequencyBands;
  if (rate >= bands.daily) return "daily";
  if (rate >= bands.weekly) return "weekly";
  if (rate >= bands.biweekly) return "biweekly";
  return "monthly";
}

/** Below this many payments per month a weekly reading needs weekly gaps. */
const FULL_WEEKLY_RATE = 4;

/** Median days between consecutive payments, in date order. */
export function medianGap(dates: readonly string[]): number {
  const sorted = [...dates].sort();
  const gaps: number[] = [];
  for (let i = 1; i < sorted.length; i++) {
    const prev = sorted[i - 1];
    const cur = sorted[i];
    if (prev && cur) gaps.push(daysBetween(prev, cur));
  }
  return median(gaps);
}

export function classifyFrequency(
  dates: readonly string[],
  coverage: StatementPeriod | null,
  policy: PositionPolicy,
): PaymentFrequency {
  const rate = median(monthlyPaymentRates(dates, coverage, policy.minCoveredDaysPerMonth));
  const frequency = frequencyFromRate(rate, policy);
  if (frequency === "weekly" && rate < FULL_WEEKLY_RATE) {
    const split = (policy.intervalDays.weekly + policy.intervalDays.biweekly) / 2;
    if (medianGap(dates) >= split) return "biweekly";
  }
  return frequency;
}

export interface GapStats {
  /** Mean days between consecutive dates */
  mean: number;
  /** Coefficient of variation of the gaps; 0 with fewer than two gaps */
  cv: number;
}

/** Gap statistics over dates in ascending order. */
export function gapStats(dates: readonly string[]): GapStats {
  const gaps: number[] = [];
  for (let i = 1; i < dates.length; i++) {
    const prev = dates[i - 1];
    const cur = dates[i];
    if (prev && cur) gaps.push(daysBetween(prev, cur));
  }
  if (gaps.length === 0) return { mean: 0, cv: 0 };
  const mean = gaps.reduce((s, g) => s + g, 0) / gaps.length;
  if (mean === 0) return { mean, cv: 0 };
  const variance = gaps.reduce((s, g) => s + (g - mean) ** 2, 0) / gaps.length;
  return { mean, cv: Math.sqrt(variance) / mean };
}
