import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { loadUnderwritingConfig } from "@/lib/config";
import { matchLender } from "../matchLender";
import { sourceKey, stripCorporateSuffixes } from "../normalize";

const TABLES = loadUnderwritingConfig().lenders;

describe("matchLender", () => {
  it("tier 1: exact company identifier", () => {
    assert.deepEqual(matchLender("ORIG CO NAME:EFT ORIG ID:9144978400", TABLES), {
      lender: "eFinancialTree",
      tier: 1,
      evidence: "9144978400",
    });
    assert.equal(matchLender("SPOTON MINPMT 0412", TABLES)?.lender, "SpotOn");
  });

  it("tier 2: alias with spaces removed", () => {
    const match = matchLender("Orig CO Name:Ondeck Capital Orig ID:1234 Sec:CCD", TABLES);
    assert.equal(match?.lender, "OnDeck");
    assert.equal(match?.tier, 2);
  });

  it("tier 2 compares whole words only", () => {
    assert.equal(matchLender("AMERICAN CAPITAL SUPPLY", TABLES, { structural: false }), null);
  });

  it("tier 3: structural patterns name the lender", () => {
    assert.deepEqual(
      [
        matchLender("LENDERCO DES:ACH PMT ID:XXXXX1234", TABLES)?.lender,
        matchLender("ACH DEBIT PINNACLE FUNDING LLC ID 99", TABLES)?.lender,
        matchLender("ACH DEBIT LENDERCO ID 8812", TABLES)?.lender,
      ],
      ["LENDERCO", "PINNACLE FUNDING", "LENDERCO"],
    );
    assert.equal(matchLender("ACH DEBIT LENDERCO ID 8812", TABLES)?.tier, 3);
  });

  it("tier 3 without a capture group is an unknown lender", () => {
    assert.equal(matchLender("DAILY ACH MERCHANT 0091", TABLES)?.lender, "Unknown MCA");
  });

  it("returns null for ordinary debits", () => {
    assert.equal(matchLender("COMCAST BUSINESS", TABLES), null);
  });
});

describe("normalize helpers", () => {
  it("strips trailing corporate suffixes only", () => {
    assert.equal(stripCorporateSuffixes("LIBERTAS FUNDING LLC", ["LLC", "INC"]), "LIBERTAS FUNDING");
    assert.equal(stripCorporateSuffixes("LLC", ["LLC"]), "LLC");
  });

  it("builds deposit source keys from the first three words", () => {
    assert.equal(sourceKey("Square Inc 240102 SQ ACME"), "SQUARE INC SQ");
    assert.equal(sourceKey("CUSTOMER DEPOSIT #1043"), "CUSTOMER DEPOSIT");
  });
});
