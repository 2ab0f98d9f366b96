import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { loadUnderwritingConfig } from "@/lib/config";
import { runUnderwritingBatch } from "../batch";
import { InvalidStatementInputError } from "../errors";
import { runUnderwritingPipeline } from "../runUnderwritingPipeline";
import { FIXED_NOW, LEDGER_STATEMENT_TEXT } from "./fixtures";

const CONFIG = loadUnderwritingConfig();
const OPTIONS = { config: CONFIG, now: FIXED_NOW };
const STATEMENT = { text: LEDGER_STATEMENT_TEXT, sourceIdentifier: "january.pdf" };

describe("runUnderwritingPipeline", () => {
  it("underwrites the single-lender ledger end to end", async () => {
    const result = await runUnderwritingPipeline(STATEMENT, OPTIONS);

    assert.deepEqual(result.format, { id: "generic", matchedPatterns: [] });
    assert.deepEqual(result.extraction, {
      source: "text",
      period: { start: "2024-01-01", end: "2024-01-31" },
      openingBalance: 0,
      closingBalance: 500,
      transactionCount: 9,
    });
    assert.equal(result.quality.score, 100);
    assert.equal(result.quality.status, "GOOD");
    assert.equal(result.reExtraction, null);
    assert.equal(result.revenue.netRevenue, 3000);
    assert.equal(result.risk.metrics.negativeBalanceDays, 0);

    assert.equal(result.positions.positions.length, 1);
    const [position] = result.positions.positions;
    assert.equal(position?.lenderLabel, "LENDERCO");
    assert.equal(position?.paymentFrequency, "weekly");
    assert.equal(position?.averagePayment, 500);

    assert.equal(result.risk.riskScore, 65);
    assert.equal(result.risk.riskTier, "B");
    assert.deepEqual(result.diagnostics, []);
  });

  it("is idempotent", async () => {
    const first = await runUnderwritingPipeline(STATEMENT, OPTIONS);
    const second = await runUnderwritingPipeline(STATEMENT, OPTIONS);
    assert.deepEqual(second, first);
  });

  it("uses the format override without detection", async () => {
    const result = await runUnderwritingPipeline(STATEMENT, { ...OPTIONS, formatOverride: "pnc" });
    assert.deepEqual(result.format, { id: "pnc", matchedPatterns: [] });
    assert.equal(result.extraction.transactionCount, 9);
  });

  it("records ambiguous formats and empty extractions as diagnostics", async () => {
    const result = await runUnderwritingPipeline({ text: "Webster Bank\nWire from PNC Bank customer" }, OPTIONS);
    assert.equal(result.sourceIdentifier, "statement");
    assert.deepEqual(result.diagnostics, [
      { code: "AMBIGUOUS_FORMAT", stage: "detect", detail: "matched webster, pnc; using webster" },
      { code: "NO_TRANSACTIONS_FOUND", stage: "extract", detail: "webster extraction found no transactions" },
    ]);
    assert.equal(result.risk.riskScore, 50);
    assert.equal(result.risk.riskTier, "C");
  });

  it("flags a stated closing balance that does not reconcile", async () => {
    const text = LEDGER_STATEMENT_TEXT.replace("Ending Balance $500.00", "Ending Balance $900.00");
    const result = await runUnderwritingPipeline({ text }, OPTIONS);
    assert.deepEqual(result.diagnostics, [
      {
        code: "INCOMPLETE_RECONCILIATION",
        stage: "validate",
        detail: "stated closing 900.00 differs from opening + net 500.00",
      },
    ]);
  });

  it("throws only for structurally invalid input", async () => {
    await assert.rejects(() => runUnderwritingPipeline(null, OPTIONS), InvalidStatementInputError);
    await assert.rejects(() => runUnderwritingPipeline({ text: 42 }, OPTIONS), InvalidStatementInputError);
    await assert.rejects(
      () => runUnderwritingPipeline({ text: "x", tables: [["not a row"]] }, OPTIONS),
      InvalidStatementInputError,
    );
  });
});

describe("runUnderwritingBatch", () => {
  it("reports each statement in its own slot", async () => {
    const results = await runUnderwritingBatch([STATEMENT, null, { text: "" }], { ...OPTIONS, concurrency: 2 });
    assert.deepEqual(
      results.map((r) => [r.index, r.ok]),
      [
        [0, true],
        [1, false],
        [2, true],
      ],
    );
    const failed = results[1];
    assert.ok(failed && !failed.ok);
    assert.equal(failed.error, "[underwritingPipeline] invalid statement input: statement");
  });
});
