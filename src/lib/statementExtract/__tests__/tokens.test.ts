import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { leadingDateToken, parseAmount, parseDateToken } from "../tokens";

describe("parseAmount", () => {
  it("reads unsigned amounts with currency and separators", () => {
    assert.deepEqual(parseAmount("$1,234.56"), { magnitude: 1234.56, sign: null });
    assert.deepEqual(parseAmount("5000.00"), { magnitude: 5000, sign: null });
  });

  it("reads every printed debit form", () => {
    assert.deepEqual(parseAmount("(1,234.56)"), { magnitude: 1234.56, sign: -1 });
    assert.deepEqual(parseAmount("1,194.31-"), { magnitude: 1194.31, sign: -1 });
    assert.deepEqual(parseAmount("-$150.00"), { magnitude: 150, sign: -1 });
    assert.deepEqual(parseAmount("$-150.00"), { magnitude: 150, sign: -1 });
    assert.deepEqual(parseAmount("85.00<"), { magnitude: 85, sign: -1 });
  });

  it("keeps an explicit plus", () => {
    assert.deepEqual(parseAmount("+12.00"), { magnitude: 12, sign: 1 });
  });

  it("rejects tokens that are not amounts", () => {
    assert.equal(parseAmount("1234"), null);
    assert.equal(parseAmount("12.5"), null);
    assert.equal(parseAmount("1,23.00"), null);
    assert.equal(parseAmount("01/05"), null);
  });
});

describe("parseDateToken", () => {
  const crossYear = { period: { start: "2023-12-15", end: "2024-01-14" }, fallbackYear: 2024 };

  it("rolls month/day dates into the next year across a year-end period", () => {
    assert.equal(parseDateToken("12/20", crossYear), "2023-12-20");
    assert.equal(parseDateToken("01/05", crossYear), "2024-01-05");
    assert.equal(parseDateToken("Jan 5", crossYear), "2024-01-05");
  });

  it("uses the fallback year without a period", () => {
    assert.equal(parseDateToken("Feb 29", { period: null, fallbackYear: 2024 }), "2024-02-29");
  });

  it("reads full dates directly", () => {
    const ctx = { period: null, fallbackYear: 1999 };
    assert.equal(parseDateToken("01/05/24", ctx), "2024-01-05");
    assert.equal(parseDateToken("2024-03-01", ctx), "2024-03-01");
    assert.equal(parseDateToken("Sept 3, 2024", ctx), "2024-09-03");
  });

  it("rejects impossible dates", () => {
    assert.equal(parseDateToken("02/30/2024", { period: null, fallbackYear: 2024 }), null);
  });
});

describe("leadingDateToken", () => {
  it("finds slash and month-name dates", () => {
    assert.equal(leadingDateToken("01/02 Deposit 1,500.00"), "01/02");
    assert.equal(leadingDateToken("Feb 2 Electronic Deposit"), "Feb 2");
  });

  it("ignores words that only look like month names", () => {
    assert.equal(leadingDateToken("Total 12 items"), null);
    assert.equal(leadingDateToken("Trn: 0161234567"), null);
  });
});
