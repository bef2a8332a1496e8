/**
 * Narrative Reporter — note rules, summary line, text report.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import type { HealthAssessment } from "@/lib/healthScoring/types";
import { emptyRatioValues } from "@/lib/ratios/ratios";
import type { RatioValues } from "@/lib/ratios/types";
import { formatPercent, generateNarrativeNotes, summarizeNotes } from "../notes";
import { renderHealthReport, renderRankingTable, renderTrendTable, scoreBar } from "../report";

function ratios(overrides: Partial<RatioValues>): RatioValues {
  return { ...emptyRatioValues(), ...overrides };
}

function messages(r: RatioValues, growth?: { revenue_growth: number | null; profit_growth: number | null }) {
  return generateNarrativeNotes(r, growth).map((n) => n.message);
}

// ---------------------------------------------------------------------------
// Rules
// ---------------------------------------------------------------------------

describe("generateNarrativeNotes", () => {
  it("flags liquidity stress", () => {
    const notes = generateNarrativeNotes(ratios({ current_ratio: 0.85, cash_ratio: 0.05 }));
    assert.deepEqual(notes, [
      { category: "liquidity", tone: "alert", message: "Current ratio (0.85) below 1.0 - possible liquidity problems" },
      { category: "liquidity", tone: "warning", message: "Cash ratio (0.05) low - limited cash reserves" },
    ]);
  });

  it("notes idle capital and healthy liquidity", () => {
    assert.deepEqual(messages(ratios({ current_ratio: 3.2 })), [
      "Current ratio (3.20) very high - possible idle capital",
    ]);
    assert.deepEqual(messages(ratios({ current_ratio: 1.5 })), ["Current ratio (1.50) healthy"]);
  });

  it("classifies profitability by sign and band", () => {
    assert.deepEqual(messages(ratios({ net_margin: -0.05, gross_margin: 0.6, roa: 0.03 })), [
      "Gross margin: 60.0% - strong",
      "Net margin: -5.0% - negative",
      "Return on assets: 3.0% - below target",
    ]);
  });

  it("says nothing about a middling margin", () => {
    assert.deepEqual(messages(ratios({ operating_margin: 0.1 })), []);
  });

  it("covers leverage", () => {
    assert.deepEqual(messages(ratios({ debt_to_equity: 2.5, debt_to_assets: 0.75 })), [
      "Debt-to-equity (2.50) very high - heavily leveraged",
      "Debt-to-assets (0.75) elevated - over 60% of assets financed by debt",
    ]);
    assert.deepEqual(messages(ratios({ debt_to_equity: 0.3 })), [
      "Debt-to-equity (0.30) conservative - low leverage",
    ]);
    assert.deepEqual(messages(ratios({ debt_to_equity: 1.2 })), [
      "Debt-to-equity (1.20) within acceptable levels",
    ]);
  });

  it("covers cash flow", () => {
    assert.deepEqual(messages(ratios({ operating_cash_flow_ratio: 0.2, free_cash_flow_margin: -0.04 })), [
      "Operating cash flow ratio (0.20) low",
      "Free cash flow margin (-4.0%) negative - company is burning cash",
    ]);
    assert.deepEqual(messages(ratios({ operating_cash_flow_ratio: 1.1, free_cash_flow_margin: 0.2 })), [
      "Operating cash flow ratio (1.10) excellent - strong cash generation",
      "Free cash flow margin (20.0%) strong",
    ]);
  });

  it("covers growth", () => {
    const empty = emptyRatioValues();
    assert.deepEqual(messages(empty, { revenue_growth: 0.25, profit_growth: 0.3 }), [
      "Revenue growth: +25.0% - excellent",
      "Profit growth: +30.0%",
    ]);
    assert.deepEqual(messages(empty, { revenue_growth: 0.15, profit_growth: 0.05 }), [
      "Revenue growth: +15.0% - good",
    ]);
    assert.deepEqual(messages(empty, { revenue_growth: 0.05, profit_growth: null }), [
      "Revenue growth: +5.0% - moderate",
    ]);
    assert.deepEqual(messages(empty, { revenue_growth: -0.12, profit_growth: -0.25 }), [
      "Revenue declining: -12.0%",
      "Profit declining: -25.0%",
    ]);
  });

  it("emits notes in category order", () => {
    const notes = generateNarrativeNotes(
      ratios({ free_cash_flow_margin: -0.1, debt_to_equity: 2.5, net_margin: -0.1, current_ratio: 0.9 }),
      { revenue_growth: -0.2, profit_growth: null },
    );
    assert.deepEqual(
      notes.map((n) => n.category),
      ["liquidity", "profitability", "leverage", "cash_flow", "growth"],
    );
  });

  it("is empty with no data", () => {
    assert.deepEqual(generateNarrativeNotes(emptyRatioValues(), null), []);
  });
});

describe("summarizeNotes", () => {
  it("joins messages with semicolons", () => {
    const notes = generateNarrativeNotes(ratios({ current_ratio: 0.85, debt_to_equity: 2.5 }));
    assert.equal(
      summarizeNotes(notes),
      "Current ratio (0.85) below 1.0 - possible liquidity problems; Debt-to-equity (2.50) very high - heavily leveraged",
    );
  });

  it("has a fixed line for no notes", () => {
    assert.equal(summarizeNotes([]), "No significant concerns identified.");
  });
});

describe("formatPercent", () => {
  it("uses one decimal", () => {
    assert.equal(formatPercent(0.1234), "12.3%");
  });
});

// ---------------------------------------------------------------------------
// Report
// ---------------------------------------------------------------------------

describe("scoreBar", () => {
  it("fills floor(score / 10) of 10 cells", () => {
    assert.equal(scoreBar(87.5), "████████░░");
    assert.equal(scoreBar(100), "██████████");
    assert.equal(scoreBar(null), "░░░░░░░░░░");
  });
});

describe("renderHealthReport", () => {
  const assessment: HealthAssessment = {
    ticker: "TEST",
    fiscalYear: 2023,
    scorer: "category_weighted",
    categoryScores: [
      { category: "liquidity", score: 75, observed: 1 },
      { category: "profitability", score: null, observed: 0 },
      { category: "leverage", score: 100, observed: 2 },
      { category: "cash_flow", score: 100, observed: 2 },
      { category: "growth", score: 50, observed: 0 },
    ],
    overallScore: 84.4,
    status: "Excellent",
    notes: ["Current ratio (1.50) healthy"],
  };

  it("renders header, categories, notes and recommendation", () => {
    const lines = renderHealthReport(assessment, { companyName: "Test Corp" }).split("\n");
    assert.equal(lines[0], "=".repeat(70));
    assert.equal(lines[1], "  FINANCIAL HEALTH REPORT - TEST (Test Corp)");
    assert.equal(lines[2], "  Fiscal year: 2023");
    assert.ok(lines.includes("  Overall score: 84.4/100"));
    assert.ok(lines.includes("  Status: Excellent"));
    assert.ok(lines.includes("  LIQUIDITY       [███████░░░] 75.0"));
    assert.ok(lines.includes("  PROFITABILITY   [░░░░░░░░░░] n/a"));
    assert.ok(lines.includes("  Current ratio (1.50) healthy"));
    assert.ok(lines.includes("  Excellent financial health."));
    assert.equal(lines[lines.length - 1], "=".repeat(70));
  });

  it("renders an insufficient-data report for Unknown", () => {
    const text = renderHealthReport({ ...assessment, overallScore: undefined, status: "Unknown", notes: [] });
    const lines = text.split("\n");
    assert.equal(lines[1], "  FINANCIAL HEALTH REPORT - TEST");
    assert.ok(lines.includes("  Overall score: insufficient data"));
    assert.ok(lines.includes("  Insufficient data to assess financial health."));
    assert.ok(!lines.includes("  Category scores:"));
  });
});

describe("renderRankingTable", () => {
  it("lists ranked and unranked rows with company and health columns", () => {
    const text = renderRankingTable([
      { ticker: "AAA", companyName: "Alpha Corp", fiscalYear: 2023, score: 81.25, status: "Excellent", rank: 1 },
      { ticker: "BBB", companyName: "Beta", fiscalYear: 2023, score: 40, status: "Concerning", rank: 2 },
      { ticker: "ZZZ", score: undefined, status: "Unknown", rank: null },
    ]);
    const lines = text.split("\n");
    assert.equal(lines[3], "  #   Ticker  Company                 Year    Score  Status     Healthy");
    assert.equal(lines[5], "  1   AAA     Alpha Corp              2023     81.3  Excellent  ✅");
    assert.equal(lines[6], "  2   BBB     Beta                    2023     40.0  Concerning ❌");
    assert.equal(lines[7], "  -   ZZZ     -                       -         n/a  Unknown    -");
  });
});

describe("renderTrendTable", () => {
  it("shows span, signed CAGR and direction per metric", () => {
    const text = renderTrendTable([
      {
        metric: "revenue",
        points: [
          { fiscalYear: 2021, value: 100 },
          { fiscalYear: 2023, value: 121 },
        ],
        cagr: 0.1,
        direction: "up",
      },
      {
        metric: "net_income",
        points: [
          { fiscalYear: 2022, value: 40 },
          { fiscalYear: 2023, value: 30 },
        ],
        cagr: -0.25,
        direction: "down",
      },
      { metric: "free_cash_flow", points: [], cagr: null, direction: "insufficient_data" },
    ]);
    assert.deepEqual(text.split("\n"), [
      "  Trend               Years          CAGR  Direction",
      `  ${"-".repeat(40)}`,
      "  REVENUE             2021-2023    +10.0%  up",
      "  NET_INCOME          2022-2023    -25.0%  down",
      "  FREE_CASH_FLOW      -               n/a  insufficient_data",
    ]);
  });
});
