import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  computeGrowthRates,
  computeMetricTrend,
  DEFAULT_GROWTH_SCORING,
  growthBandIndex,
  growthRate,
  scoreGrowthCategory,
  scoreProfitGrowth,
  scoreRevenueGrowth,
} from "../growth";

describe("growthRate", () => {
  it("is relative to the absolute prior value", () => {
    assert.equal(growthRate(120, 100), 0.2);
    assert.equal(growthRate(80, -100), 1.8);
    assert.equal(growthRate(50, 100), -0.5);
  });

  it("is null without a usable prior value", () => {
    assert.equal(growthRate(120, 0), null);
    assert.equal(growthRate(120, null), null);
    assert.equal(growthRate(null, 100), null);
  });
});

describe("computeGrowthRates", () => {
  it("uses the prior year's revenue and net income", () => {
    assert.deepEqual(
      computeGrowthRates({ revenue: 120, netIncome: 30 }, { revenue: 100, netIncome: 20 }),
      { revenue_growth: 0.2, profit_growth: 0.5 },
    );
  });

  it("is all null without a prior year", () => {
    assert.deepEqual(computeGrowthRates({ revenue: 120, netIncome: 30 }, null), {
      revenue_growth: null,
      profit_growth: null,
    });
  });
});

describe("growth bands", () => {
  it("revenue bands use strict comparisons", () => {
    assert.equal(scoreRevenueGrowth(0.21), 100);
    assert.equal(scoreRevenueGrowth(0.2), 75);
    assert.equal(scoreRevenueGrowth(0.05), 50);
    assert.equal(scoreRevenueGrowth(0), 25);
    assert.equal(scoreRevenueGrowth(-0.3), 25);
  });

  it("profit bands use strict comparisons", () => {
    assert.equal(scoreProfitGrowth(0.16), 100);
    assert.equal(scoreProfitGrowth(0.15), 75);
    assert.equal(scoreProfitGrowth(-0.05), 50);
    assert.equal(scoreProfitGrowth(-0.1), 25);
  });
});

describe("growthBandIndex", () => {
  it("returns the first band cleared, or the band count", () => {
    const bands = DEFAULT_GROWTH_SCORING.revenueBands;
    assert.equal(growthBandIndex(0.25, bands), 0);
    assert.equal(growthBandIndex(0.2, bands), 1);
    assert.equal(growthBandIndex(0, bands), 3);
  });
});

describe("scoreGrowthCategory", () => {
  it("averages the rates present", () => {
    assert.deepEqual(scoreGrowthCategory({ revenue_growth: 0.25, profit_growth: -0.2 }), { score: 62.5, observed: 2 });
    assert.deepEqual(scoreGrowthCategory({ revenue_growth: 0.15, profit_growth: null }), { score: 75, observed: 1 });
  });

  it("falls back to the neutral score", () => {
    assert.deepEqual(scoreGrowthCategory(null), { score: 50, observed: 0 });
    assert.deepEqual(scoreGrowthCategory({ revenue_growth: null, profit_growth: null }, { ...DEFAULT_GROWTH_SCORING, neutralScore: 40 }), { score: 40, observed: 0 });
  });
});

describe("computeMetricTrend", () => {
  it("computes CAGR over the years spanned", () => {
    const trend = computeMetricTrend("revenue", [
      { fiscalYear: 2023, value: 146.41 },
      { fiscalYear: 2019, value: 100 },
      { fiscalYear: 2021, value: 121 },
    ]);
    assert.equal(trend.cagr?.toFixed(4), "0.1000");
    assert.equal(trend.direction, "up");
    assert.deepEqual(trend.points.map((p) => p.fiscalYear), [2019, 2021, 2023]);
  });

  it("treats a change within 1% a year as flat", () => {
    const trend = computeMetricTrend("revenue", [
      { fiscalYear: 2022, value: 100 },
      { fiscalYear: 2023, value: 100.5 },
    ]);
    assert.equal(trend.direction, "flat");
  });

  it("reports a decline", () => {
    const trend = computeMetricTrend("net_income", [
      { fiscalYear: 2022, value: 100 },
      { fiscalYear: 2023, value: 64 },
    ]);
    assert.equal(trend.cagr?.toFixed(2), "-0.36");
    assert.equal(trend.direction, "down");
  });

  it("has no CAGR across a sign change, but still a direction", () => {
    const trend = computeMetricTrend("net_income", [
      { fiscalYear: 2021, value: -10 },
      { fiscalYear: 2023, value: 5 },
    ]);
    assert.equal(trend.cagr, null);
    assert.equal(trend.direction, "up");
  });

  it("keeps only the most recent window of finite values", () => {
    const series = [2017, 2018, 2019, 2020, 2021, 2022, 2023].map((fiscalYear) => ({
      fiscalYear,
      value: fiscalYear === 2020 ? null : 100,
    }));
    const trend = computeMetricTrend("revenue", series, 3);
    assert.deepEqual(trend.points.map((p) => p.fiscalYear), [2021, 2022, 2023]);
    assert.equal(trend.cagr, 0);
    assert.equal(trend.direction, "flat");
  });

  it("needs two points", () => {
    const trend = computeMetricTrend("revenue", [
      { fiscalYear: 2023, value: 100 },
      { fiscalYear: 2022, value: Number.NaN },
    ]);
    assert.equal(trend.direction, "insufficient_data");
    assert.equal(trend.cagr, null);
  });
});
