import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { loadUnderwritingConfig } from "@/lib/config";
import type { ExtractionQualityReport } from "@/lib/extractionQuality/types";
import { reconstructPositions } from "@/lib/positionEngine";
import { scrubTransactions } from "@/lib/scrubber";
import type { MonthlyRevenue } from "@/lib/scrubber/types";
import type { Transaction } from "@/lib/statementModel/types";
import { detectRedFlags, noTransactionsFlag } from "../redFlags";
import { computeDeductions, scoreRisk, tierFromScore } from "../scoreRisk";
import { countNsf, daysSinceFunding, debtToIncome, legalActionHits, negativeBalanceDays, revenueVelocity } from "../signals";
import type { RiskMetrics } from "../types";

// ---------------------------------------------------------------------------
// Test Fixtures
// ---------------------------------------------------------------------------

const CONFIG = loadUnderwritingConfig();
const POLICY = CONFIG.policy.risk;
const JANUARY = { start: "2024-01-01", end: "2024-01-31" };

const GOOD_QUALITY: ExtractionQualityReport = {
  score: 100,
  status: "GOOD",
  checks: [],
  recommendation: "Extraction is complete; proceed with analysis.",
};

let line = 0;
function tx(date: string, description: string, amount: number, runningBalance: number | null = null): Transaction {
  line++;
  return { date, description, amount, runningBalance, sourceLineRef: { kind: "text", line } };
}

const STATEMENT: Transaction[] = [
  tx("2024-01-02", "CARD SETTLEMENT STRIPE", 4000, 4000),
  tx("2024-01-05", "CUSTOMER DEPOSIT", 1500, 5500),
  tx("2024-01-08", "ACH DEBIT LENDERCO ID 8812", -500, 5000),
  tx("2024-01-10", "COMCAST BUSINESS", -200, 4800),
  tx("2024-01-15", "ACH DEBIT LENDERCO ID 8812", -500, 4300),
  tx("2024-01-18", "SYSCO FOODS", -1300, 3000),
  tx("2024-01-22", "ACH DEBIT LENDERCO ID 8812", -500, 2500),
  tx("2024-01-25", "WIRE TRANSFER TO SAVINGS", -1000, 1500),
  tx("2024-01-29", "RENT JANUARY", -1000, 500),
];

function scrub(transactions: Transaction[], openingBalance: number | null = null) {
  return scrubTransactions({ transactions, period: transactions.length > 0 ? JANUARY : null, openingBalance }, CONFIG);
}

function month(m: string, deposits: number): MonthlyRevenue {
  return { month: m, deposits, withdrawals: 0, net: deposits };
}

const QUIET: RiskMetrics = {
  nsfCount: 0,
  negativeBalanceDays: 0,
  knownBalanceDays: 31,
  negativeBalancePct: 0,
  debtToIncome: 0,
  gamblingCount: 0,
  gamblingTotal: 0,
  stackingCount: 0,
  stoppedPositions: 0,
  daysSinceFunding: null,
  legalHits: { GARNISHMENT: 0, TAX_LEVY: 0, LIEN: 0, JUDGMENT: 0, BANKRUPTCY: 0 },
  velocity: { monthlyChangesPct: [], averageChangePct: null, accelerationPct: null, trend: "insufficient_data" },
  averageMonthlyDeposits: 50000,
  cashDepositShare: 0,
  returnedItemCount: 0,
  returnedItemTotal: 0,
};

const TROUBLED: RiskMetrics = {
  ...QUIET,
  nsfCount: 6,
  negativeBalanceDays: 5,
  negativeBalancePct: 5,
  debtToIncome: 0.6,
  gamblingCount: 1,
  gamblingTotal: 200,
  stackingCount: 4,
  stoppedPositions: 2,
  daysSinceFunding: 20,
  legalHits: { ...QUIET.legalHits, TAX_LEVY: 1, LIEN: 1 },
  velocity: { monthlyChangesPct: [-10, -5], averageChangePct: -7.5, accelerationPct: 5, trend: "declining" },
  averageMonthlyDeposits: 8000,
  cashDepositShare: 0.25,
  returnedItemCount: 3,
  returnedItemTotal: 1200,
};

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("scoreRisk", () => {
  it("scores the single-position statement", () => {
    const scrubbed = scrub(STATEMENT, 0);
    const positions = reconstructPositions(scrubbed, CONFIG);
    const profile = scoreRisk({ ...scrubbed, positions, quality: GOOD_QUALITY }, CONFIG);

    assert.equal(profile.metrics.debtToIncome, 0.3936);
    assert.equal(profile.metrics.negativeBalanceDays, 0);
    assert.equal(profile.metrics.daysSinceFunding, null);
    assert.equal(profile.componentSignals.debt_to_income, 15);
    assert.equal(profile.componentSignals.stacking, 10);
    assert.equal(profile.componentSignals.low_revenue, 10);
    assert.equal(profile.riskScore, 65);
    assert.equal(profile.riskTier, "B");
    assert.deepEqual(profile.redFlags, [
      { code: "HIGH_DTI", severity: "HIGH", detail: "Debt service is 39.4% of average monthly deposits" },
    ]);
  });

  it("returns the neutral score when nothing was extracted", () => {
    const scrubbed = scrub([]);
    const positions = reconstructPositions(scrubbed, CONFIG);
    const profile = scoreRisk(
      { ...scrubbed, positions, quality: { ...GOOD_QUALITY, score: 0, status: "POOR" } },
      CONFIG,
    );
    assert.equal(profile.riskScore, 50);
    assert.equal(profile.riskTier, "C");
    assert.deepEqual(
      profile.redFlags.map((f) => [f.code, f.severity]),
      [["NO_TRANSACTIONS", "CRITICAL"]],
    );
  });
});

describe("computeDeductions", () => {
  it("deducts nothing for a quiet account", () => {
    const d = computeDeductions(QUIET, "GOOD", POLICY);
    assert.equal(Object.values(d).reduce((s, v) => s + v, 0), 0);
  });

  it("applies every capped weight", () => {
    assert.deepEqual(computeDeductions(TROUBLED, "NEEDS_REVIEW", POLICY), {
      nsf_activity: 25,
      negative_balance_days: 10,
      debt_to_income: 25,
      gambling: 15,
      stacking: 25,
      recent_funding: 8,
      legal_actions: 20,
      revenue_trend: 10,
      low_revenue: 10,
      cash_deposits: 10,
      extraction_quality: 5,
    });
  });

  it("scales negative days by their share of known days", () => {
    const d = computeDeductions({ ...QUIET, negativeBalanceDays: 2, negativeBalancePct: 4 }, "GOOD", POLICY);
    assert.equal(d.negative_balance_days, 6);
  });
});

describe("detectRedFlags", () => {
  it("grades every flag MEDIUM, HIGH or CRITICAL", () => {
    const severities = new Set(
      [
        ...detectRedFlags(TROUBLED, { status: "POOR", score: 20 }),
        ...detectRedFlags(TROUBLED, { status: "NEEDS_REVIEW", score: 78 }),
        noTransactionsFlag(),
      ].map((f) => f.severity),
    );
    assert.deepEqual([...severities].sort(), ["CRITICAL", "HIGH", "MEDIUM"]);
  });

  it("reports flags in evaluation order", () => {
    assert.deepEqual(
      detectRedFlags(TROUBLED, { status: "NEEDS_REVIEW", score: 78 }).map((f) => [f.code, f.severity]),
      [
        ["EXTRACTION_QUALITY", "MEDIUM"],
        ["NSF_ACTIVITY", "HIGH"],
        ["NEGATIVE_BALANCE_DAYS", "HIGH"],
        ["HIGH_DTI", "CRITICAL"],
        ["GAMBLING", "HIGH"],
        ["MODERATE_STACKING", "HIGH"],
        ["RECENT_FUNDING", "HIGH"],
        ["TAX_LEVY", "HIGH"],
        ["LIEN", "HIGH"],
        ["REVENUE_DECLINE", "MEDIUM"],
        ["STOPPED_PAYMENTS", "HIGH"],
        ["RETURNED_DEPOSITS", "HIGH"],
      ],
    );
  });

  it("grades stacking and funding recency", () => {
    const heavy = detectRedFlags({ ...QUIET, stackingCount: 5, daysSinceFunding: 3 }, { status: "GOOD", score: 100 });
    assert.deepEqual(heavy, [
      { code: "HEAVY_STACKING", severity: "CRITICAL", detail: "5 active MCA positions detected" },
      { code: "VERY_RECENT_FUNDING", severity: "CRITICAL", detail: "Most recent funding only 3 days ago" },
    ]);
    const pair = detectRedFlags({ ...QUIET, stackingCount: 2 }, { status: "GOOD", score: 100 });
    assert.deepEqual(pair.map((f) => f.code), ["STACKING"]);
  });
});

describe("tierFromScore", () => {
  it("uses the configured lower bounds", () => {
    assert.deepEqual(
      [80, 79, 60, 40, 20, 19, 0].map((s) => tierFromScore(s, POLICY)),
      ["A", "B", "B", "C", "D", "Decline", "Decline"],
    );
  });
});

describe("signals", () => {
  it("counts NSF charges but not waivers or refunds", () => {
    const { transactions } = scrub([
      tx("2024-01-03", "NSF FEE ITEM 1043", -35),
      tx("2024-01-04", "OVERDRAFT FEE", -35),
      tx("2024-01-05", "OVERDRAFT FEE WAIVED", -35),
      tx("2024-01-06", "NSF FEE REFUND", 35),
    ]);
    assert.equal(countNsf(transactions, CONFIG.riskKeywords), 2);
  });

  it("measures negative days over known balances", () => {
    assert.deepEqual(
      negativeBalanceDays([
        { date: "2024-01-01", endingBalance: null },
        { date: "2024-01-02", endingBalance: -5 },
        { date: "2024-01-03", endingBalance: 10 },
        { date: "2024-01-04", endingBalance: -1 },
      ]),
      { negative: 2, known: 3, pct: 66.67 },
    );
  });

  it("treats debt service without deposits as fully leveraged", () => {
    assert.equal(debtToIncome(0, 0), 0);
    assert.equal(debtToIncome(100, 0), 1);
    assert.equal(debtToIncome(2165, 5500), 0.3936);
  });

  it("counts legal keywords once per transaction and action", () => {
    const { transactions } = scrub([
      tx("2024-01-03", "IRS LEVY 2024", -500),
      tx("2024-01-09", "STATE TAX LIEN PMT", -250),
    ]);
    assert.deepEqual(legalActionHits(transactions, CONFIG.riskKeywords), {
      GARNISHMENT: 0,
      TAX_LEVY: 1,
      LIEN: 1,
      JUDGMENT: 0,
      BANKRUPTCY: 0,
    });
  });

  it("dates the latest funding event", () => {
    const scrubbed = scrub([
      tx("2024-01-05", "LOAN PROCEEDS", 4000),
      tx("2024-01-20", "LOAN PROCEEDS", 10000),
    ]);
    const positions = reconstructPositions(scrubbed, CONFIG);
    assert.equal(daysSinceFunding(scrubbed.transactions, positions, "2024-01-31", CONFIG), 11);
    assert.equal(daysSinceFunding([], positions, "2024-01-31", CONFIG), null);
  });

  it("classifies revenue velocity", () => {
    const accelerating = revenueVelocity(
      [month("2024-01", 10000), month("2024-02", 9000), month("2024-03", 7000)],
      POLICY,
    );
    assert.deepEqual(accelerating, {
      monthlyChangesPct: [-10, -22.22],
      averageChangePct: -16.11,
      accelerationPct: -12.22,
      trend: "accelerating_decline",
    });
    assert.equal(
      revenueVelocity([month("2024-01", 10000), month("2024-02", 9000), month("2024-03", 8550)], POLICY).trend,
      "declining",
    );
    assert.equal(revenueVelocity([month("2024-01", 10000), month("2024-02", 11000)], POLICY).trend, "growing");
    assert.equal(revenueVelocity([month("2024-01", 10000)], POLICY).trend, "insufficient_data");
  });
});
