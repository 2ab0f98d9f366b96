import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { serverEnv } from "../server";

describe("serverEnv", () => {
  it("applies defaults for an empty environment", () => {
    const env = serverEnv({});
    assert.equal(env.RE_EXTRACTION_TIMEOUT_MS, 20_000);
    assert.equal(env.BATCH_CONCURRENCY, 4);
    assert.equal(env.ANTHROPIC_API_KEY, undefined);
  });

  it("coerces numeric settings", () => {
    const env = serverEnv({ RE_EXTRACTION_TIMEOUT_MS: "5000", BATCH_CONCURRENCY: "2", ANTHROPIC_API_KEY: "test-secret" });
    assert.equal(env.RE_EXTRACTION_TIMEOUT_MS, 5000);
    assert.equal(env.BATCH_CONCURRENCY, 2);
    assert.equal(env.ANTHROPIC_API_KEY, "test-secret");
  });

  it("throws on invalid values", () => {
    const originalError = console.error;
    console.error = () => {};
    try {
      assert.throws(() => serverEnv({ BATCH_CONCURRENCY: "0" }), /Invalid server environment/);
    } finally {
      console.error = originalError;
    }
  });
});
