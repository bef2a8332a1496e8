import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { rankCompanies, summarizeRanking } from "../rank";
import { assignYearRanks } from "../yearRanks";

describe("rankCompanies", () => {
  const entries = [
    { ticker: "MSFT", score: 80 },
    { ticker: "ZZZZ", score: undefined },
    { ticker: "AAPL", score: 80 },
    { ticker: "NVDA", score: 90 },
    { ticker: "AAAA", score: undefined },
    { ticker: "TSLA", score: 42.5 },
  ];

  it("orders by score descending, ties by ticker, unscored last", () => {
    const ranked = rankCompanies(entries);
    assert.deepEqual(
      ranked.map((r) => [r.ticker, r.rank]),
      [
        ["NVDA", 1],
        ["AAPL", 2],
        ["MSFT", 3],
        ["TSLA", 4],
        ["AAAA", null],
        ["ZZZZ", null],
      ],
    );
  });

  it("does not depend on input order", () => {
    const forward = rankCompanies(entries).map((r) => r.ticker);
    const reversed = rankCompanies([...entries].reverse()).map((r) => r.ticker);
    assert.deepEqual(reversed, forward);
  });

  it("keeps the entry's own fields", () => {
    const [top] = rankCompanies([{ ticker: "AAPL", score: 70, status: "Good" }]);
    assert.deepEqual(top, { ticker: "AAPL", score: 70, status: "Good", rank: 1 });
  });
});

describe("summarizeRanking", () => {
  it("counts healthy companies and averages the scored ones", () => {
    const summary = summarizeRanking([
      { ticker: "NVDA", score: 90 },
      { ticker: "AAPL", score: 80 },
      { ticker: "TSLA", score: 40 },
      { ticker: "ZZZZ", score: undefined },
    ]);
    assert.deepEqual(summary, { scored: 3, healthyCount: 2, averageScore: 70, unscored: ["ZZZZ"] });
  });

  it("has no average when nothing scored", () => {
    assert.equal(summarizeRanking([{ ticker: "AAPL", score: undefined }]).averageScore, undefined);
  });
});

describe("assignYearRanks", () => {
  const rows = [
    { ticker: "A", fiscalYear: 2023, revenue: 100, netIncome: 5, healthScore: 70 },
    { ticker: "B", fiscalYear: 2023, revenue: 200, netIncome: null, healthScore: 85 },
    { ticker: "C", fiscalYear: 2023, revenue: 200, netIncome: 10, healthScore: null },
    { ticker: "D", fiscalYear: 2023, revenue: null, netIncome: 10, healthScore: 70 },
    { ticker: "A", fiscalYear: 2022, revenue: 50, netIncome: 1, healthScore: 60 },
  ];

  it("ranks within each fiscal year with ties sharing a rank and nulls last", () => {
    const ranked = assignYearRanks(rows);
    assert.deepEqual(
      ranked.map((r) => [r.ticker, r.fiscalYear, r.revenueRank, r.profitRank, r.healthRank]),
      [
        ["A", 2023, 3, 3, 2],
        ["B", 2023, 1, 4, 1],
        ["C", 2023, 1, 1, 4],
        ["D", 2023, 4, 1, 2],
        ["A", 2022, 1, 1, 1],
      ],
    );
  });
});
