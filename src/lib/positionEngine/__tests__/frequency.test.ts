import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { loadUnderwritingConfig } from "@/lib/config";
import { eachDay, toUtcMs } from "@/lib/dates/isoDate";
import { classifyFrequency, gapStats, median, medianGap, monthlyPaymentRates } from "../frequency";

const POLICY = loadUnderwritingConfig().policy.positions;
const JANUARY = { start: "2024-01-01", end: "2024-01-31" };

function weekdays(start: string, end: string): string[] {
  return eachDay(start, end).filter((d) => {
    const dow = new Date(toUtcMs(d)).getUTCDay();
    return dow !== 0 && dow !== 6;
  });
}

describe("classifyFrequency", () => {
  it("reads each schedule from its monthly count", () => {
    assert.equal(classifyFrequency(weekdays("2024-01-01", "2024-01-31"), JANUARY, POLICY), "daily");
    assert.equal(
      classifyFrequency(["2024-01-01", "2024-01-08", "2024-01-15", "2024-01-22", "2024-01-29"], JANUARY, POLICY),
      "weekly",
    );
    assert.equal(classifyFrequency(["2024-01-05", "2024-01-19"], JANUARY, POLICY), "biweekly");
    assert.equal(classifyFrequency(["2024-01-15"], JANUARY, POLICY), "monthly");
  });

  it("tolerates a skipped week", () => {
    assert.equal(classifyFrequency(["2024-01-01", "2024-01-08", "2024-01-22", "2024-01-29"], JANUARY, POLICY), "weekly");
  });

  it("reads three payments two weeks apart as biweekly", () => {
    assert.equal(classifyFrequency(["2024-01-02", "2024-01-16", "2024-01-30"], JANUARY, POLICY), "biweekly");
  });

  it("reads three payments a week apart as weekly", () => {
    assert.equal(classifyFrequency(["2024-01-08", "2024-01-15", "2024-01-22"], JANUARY, POLICY), "weekly");
  });

  it("scales partially covered months", () => {
    const period = { start: "2024-01-15", end: "2024-02-14" };
    const dates = ["2024-01-15", "2024-01-22", "2024-01-29", "2024-02-05", "2024-02-12"];
    assert.equal(classifyFrequency(dates, period, POLICY), "weekly");
  });
});

describe("monthlyPaymentRates", () => {
  it("ignores months with too few covered days", () => {
    const period = { start: "2024-01-29", end: "2024-02-29" };
    assert.deepEqual(monthlyPaymentRates(["2024-02-05", "2024-02-12", "2024-02-19", "2024-02-26"], period, 7), [4]);
  });

  it("is empty without dates or coverage", () => {
    assert.deepEqual(monthlyPaymentRates([], null, 7), []);
  });
});

describe("gapStats", () => {
  it("measures mean gap and its variation", () => {
    const stats = gapStats(["2024-01-01", "2024-01-08", "2024-01-22", "2024-01-29"]);
    assert.ok(Math.abs(stats.mean - 28 / 3) < 1e-9);
    assert.ok(Math.abs(stats.cv - Math.SQRT2 / 4) < 1e-9);
  });

  it("is zero for a single date", () => {
    assert.deepEqual(gapStats(["2024-01-01"]), { mean: 0, cv: 0 });
  });
});

describe("medianGap", () => {
  it("sorts before measuring", () => {
    assert.equal(medianGap(["2024-01-30", "2024-01-02", "2024-01-16"]), 14);
    assert.equal(medianGap(["2024-01-02"]), 0);
  });
});

describe("median", () => {
  it("averages the middle pair", () => {
    assert.equal(median([4, 1, 3, 2]), 2.5);
    assert.equal(median([5, 1, 3]), 3);
    assert.equal(median([]), 0);
  });
});
