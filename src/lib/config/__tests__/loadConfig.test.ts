import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  UnderwritingConfigError,
  compileUnderwritingConfig,
  loadUnderwritingConfig,
  readUnderwritingConfigFiles,
} from "../index";

describe("loadUnderwritingConfig", () => {
  const config = loadUnderwritingConfig();

  it("keeps bank formats in table order", () => {
    const ids: string[] = config.bankFormats.map((f) => f.id);
    assert.equal(ids[0], "bank_of_bartlett");
    assert.ok(ids.indexOf("city_bank_tx") < ids.indexOf("chase"));
    assert.ok(!ids.includes("generic"));
  });

  it("sorts lender aliases longest first with suffixes stripped", () => {
    const lengths = config.lenders.aliases.map((a) => a.normalized.length);
    for (let i = 1; i < lengths.length; i++) {
      assert.ok((lengths[i - 1] ?? 0) >= (lengths[i] ?? 0));
    }
    assert.ok(config.lenders.aliases.some((a) => a.normalized === "ON DECK" && a.compact === "ONDECK"));
  });

  it("records per-lender factor rates", () => {
    assert.equal(config.lenders.factorRates.get("OnDeck"), 1.3);
    assert.equal(config.lenders.factorRates.get("Credibly"), undefined);
  });

  it("orders risk tiers from the highest band down", () => {
    assert.deepEqual(
      config.policy.risk.tiers.map((t) => t.tier),
      ["A", "B", "C", "D", "Decline"],
    );
  });

  it("returns a frozen object", () => {
    assert.ok(Object.isFrozen(config));
  });
});

describe("compileUnderwritingConfig", () => {
  it("rejects an invalid pattern", () => {
    const files = readUnderwritingConfigFiles();
    const broken = {
      ...files,
      categories: { ...files.categories, transferVocabulary: ["(unclosed"] },
    };
    assert.throws(() => compileUnderwritingConfig(broken), UnderwritingConfigError);
  });

  it("rejects tier bands without a floor", () => {
    const files = readUnderwritingConfigFiles();
    const broken = {
      ...files,
      policy: {
        ...files.policy,
        risk: { ...files.policy.risk, tiers: [{ tier: "A" as const, min: 80 }] },
      },
    };
    assert.throws(() => compileUnderwritingConfig(broken), /band starting at 0/);
  });

  it("fails with a file-scoped error for a missing directory", () => {
    assert.throws(() => loadUnderwritingConfig("/nonexistent-config-dir"), (err: unknown) => {
      return err instanceof UnderwritingConfigError && err.file === "bank-formats.json";
    });
  });
});
