import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { extractStatementPeriod, readStatementHeader } from "../statementHeader";

describe("readStatementHeader", () => {
  it("reads a slash period and stated balances", () => {
    const header = readStatementHeader(
      ["Statement Period: 01/01/2024 - 01/31/2024", "Beginning Balance $1,000.00", "Ending Balance $1,500.00"].join("\n"),
    );
    assert.deepEqual(header, {
      period: { start: "2024-01-01", end: "2024-01-31" },
      openingBalance: 1000,
      closingBalance: 1500,
      fallbackYear: 2024,
    });
  });

  it("reads a month-name period", () => {
    assert.deepEqual(extractStatementPeriod("January 1, 2024 through January 31, 2024"), {
      start: "2024-01-01",
      end: "2024-01-31",
    });
  });

  it("skips balance labels without an amount", () => {
    const header = readStatementHeader(["Ending Balance", "Ending balance on 1/31 $2,330.00"].join("\n"));
    assert.equal(header.closingBalance, 2330);
  });

  it("falls back to the first year in the text", () => {
    const header = readStatementHeader("Account Activity 2024");
    assert.equal(header.period, null);
    assert.equal(header.fallbackYear, 2024);
  });

  it("uses the clock year only when the text has none", () => {
    const header = readStatementHeader("no dates here", new Date(Date.UTC(2026, 5, 1)));
    assert.equal(header.fallbackYear, 2026);
  });

  it("rejects a reversed range", () => {
    assert.equal(extractStatementPeriod("01/31/2024 - 01/01/2024"), null);
  });
});
