import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { TableGrid } from "@/lib/statementModel/types";
import { extractTransactions } from "../extractTransactions";
import type { ExtractionResult } from "../types";

// ---------------------------------------------------------------------------
// Test Fixtures
// ---------------------------------------------------------------------------

const LEDGER_TEXT = [
  "First Community Bank",
  "Statement Period: 01/01/2024 - 01/31/2024",
  "Beginning Balance $1,000.00",
  "01/02/2024 CUSTOMER DEPOSIT 500.00 1,500.00",
  "01/03/2024 ACH DEBIT LENDERCO ID 8812 200.00 1,300.00",
  "REF 4471 WEB",
  "01/04/2024 POS PURCHASE OFFICE DEPOT 45.25",
  "",
  "REF 9 ignored after blank",
  "01/05/2024 DEBIT CARD 12.00 1,242.75",
].join("\n");

const MARKER_TEXT = [
  "Community Savings Bank",
  "Statement Period 02/01/2024 - 02/29/2024",
  "02/02/2024 PAYROLL ACME 1,200.00 DR",
  "02/05/2024 CUSTOMER PAYMENT INV 1001 800.00 CR",
  "02/06/2024 250.00 Cash deposit branch",
  "02/07/2024 FEE 1.234.00",
  "02/08/2024 ADJUSTMENT 0.00",
  "02/30/2024 DEPOSIT 100.00",
].join("\n");

const HEADERLESS_TABLE: TableGrid = [
  ["05/02/2024", "Card settlement", "900.00", "1,900.00"],
  ["05/03/2024", "Utility autopay", "100.00", "1,800.00"],
];

function run(text: string, tables: TableGrid[] = []): ExtractionResult {
  return extractTransactions(
    { text, tables, sourceIdentifier: "generic.pdf" },
    { id: "generic", matchedPatterns: [] },
  );
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("generic strategy: text", () => {
  it("reads amount and balance columns and wrapped descriptions", () => {
    const result = run(LEDGER_TEXT);
    assert.deepEqual(
      result.transactions.map((t) => [t.date, t.description, t.amount, t.runningBalance]),
      [
        ["2024-01-02", "CUSTOMER DEPOSIT", 500, 1500],
        ["2024-01-03", "ACH DEBIT LENDERCO ID 8812 REF 4471 WEB", -200, 1300],
        ["2024-01-04", "POS PURCHASE OFFICE DEPOT", -45.25, null],
        ["2024-01-05", "DEBIT CARD", -12, 1242.75],
      ],
    );
    assert.equal(result.source, "text");
    assert.equal(result.openingBalance, 1000);
  });

  it("honors DR/CR markers over description keywords", () => {
    const result = run(MARKER_TEXT);
    assert.deepEqual(
      result.transactions.map((t) => [t.description, t.amount]),
      [
        ["PAYROLL ACME", -1200],
        ["CUSTOMER PAYMENT INV 1001", 800],
        ["Cash deposit branch", 250],
      ],
    );
  });

  it("records skipped lines instead of throwing", () => {
    const result = run(MARKER_TEXT);
    assert.deepEqual(
      result.diagnostics.map((d) => [d.code, d.ref]),
      [
        ["MALFORMED_LINE", { kind: "text", line: 6 }],
        ["MALFORMED_LINE", { kind: "text", line: 8 }],
        ["ZERO_AMOUNT", { kind: "text", line: 7 }],
      ],
    );
  });

  it("returns an empty result for empty text", () => {
    const result = run("");
    assert.deepEqual(result.transactions, []);
    assert.equal(result.source, "none");
    assert.equal(result.period, null);
  });
});

describe("generic strategy: tables", () => {
  it("prefers tables over text", () => {
    const result = run(LEDGER_TEXT, [HEADERLESS_TABLE]);
    assert.equal(result.source, "table");
    assert.deepEqual(
      result.transactions.map((t) => [t.date, t.amount, t.runningBalance, t.sourceLineRef]),
      [
        ["2024-05-02", 900, 1900, { kind: "table", table: 0, row: 0 }],
        ["2024-05-03", -100, 1800, { kind: "table", table: 0, row: 1 }],
      ],
    );
  });
});
