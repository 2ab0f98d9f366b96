import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { loadUnderwritingConfig } from "@/lib/config";
import { detectBankFormat, matchingBankFormats } from "../index";

const config = loadUnderwritingConfig();

// ---------------------------------------------------------------------------
// Test Fixtures
// ---------------------------------------------------------------------------

const CITY_BANK_WITH_CHASE_PAYEE = [
  "City Bank, Lubbock, Texas",
  "Business Checking Statement",
  "01/12/2024 CHASE CREDIT CRD AUTOPAY 1,200.00",
].join("\n");

const CHASE_HEADER = [
  "JPMorgan Chase Bank, N.A.",
  "P O Box 182051 Columbus, OH 43218",
  "Customer Service: chase.com",
].join("\n");

describe("detectBankFormat", () => {
  it("prefers the regional bank when a national bank appears as a payee", () => {
    const result = detectBankFormat(CITY_BANK_WITH_CHASE_PAYEE, config);
    assert.equal(result.id, "city_bank_tx");
    assert.deepEqual(matchingBankFormats(CITY_BANK_WITH_CHASE_PAYEE, config), ["city_bank_tx", "chase"]);
  });

  it("reports every matching pattern of the winning format", () => {
    const result = detectBankFormat(CHASE_HEADER, config);
    assert.equal(result.id, "chase");
    assert.deepEqual(result.matchedPatterns, ["JPMorgan\\s+Chase", "chase\\.com"]);
  });

  it("does not mistake 'purchase' for Chase", () => {
    const result = detectBankFormat("Card purchase at OFFICE DEPOT", config);
    assert.equal(result.id, "generic");
    assert.deepEqual(result.matchedPatterns, []);
  });

  it("falls back to generic for empty text", () => {
    assert.equal(detectBankFormat("", config).id, "generic");
  });

  it("is deterministic", () => {
    const a = detectBankFormat(CITY_BANK_WITH_CHASE_PAYEE, config);
    const b = detectBankFormat(CITY_BANK_WITH_CHASE_PAYEE, config);
    assert.deepEqual(a, b);
  });
});
