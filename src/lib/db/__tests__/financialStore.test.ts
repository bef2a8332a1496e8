/**
 * FinancialStore — in-memory store behaviour and Postgres row mapping.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { normalizeStatements } from "@/lib/metricNormalizer/normalize";
import { scoreCompanyYear, toFlatHealthRecord } from "@/lib/pipeline/scoreCompanyYear";
import { InMemoryFinancialStore } from "../inMemoryFinancialStore";
import {
  buildInsert,
  canonicalMetricValues,
  COMPANY_HEALTH_COLUMNS,
  companyHealthValues,
  companyTrendValues,
  rowsToSlices,
  rowsToYearTotals,
  SCHEMA_SQL,
  yearRankValues,
} from "../sql";

const { records } = normalizeStatements({
  ticker: "AAPL",
  statements: {
    income: [
      { label: "Total Revenue", value: 120, fiscalYear: 2023 },
      { label: "Net Income", value: 30, fiscalYear: 2023 },
      { label: "Total Revenue", value: 100, fiscalYear: 2022 },
    ],
    balance: [{ label: "Total Assets", value: 400, fiscalYear: 2023 }],
    cashFlow: [],
  },
});

// ---------------------------------------------------------------------------
// InMemoryFinancialStore
// ---------------------------------------------------------------------------

describe("InMemoryFinancialStore", () => {
  it("serves slices, prior-year totals and fiscal years", async () => {
    const store = new InMemoryFinancialStore();
    await store.replaceCanonicalMetrics("AAPL", records);

    assert.deepEqual(await store.listFiscalYears("AAPL"), [2023, 2022]);
    assert.deepEqual(await store.loadCanonicalMetrics("AAPL", 2023), {
      income: { revenue: 120, net_income: 30 },
      balance: { total_assets: 400 },
      cashFlow: {},
    });
    assert.deepEqual(await store.loadPriorYearTotals("AAPL", 2023), { revenue: 100, netIncome: null });
    assert.equal(await store.loadPriorYearTotals("AAPL", 2022), null);
  });

  it("replaces a ticker's records wholesale", async () => {
    const store = new InMemoryFinancialStore();
    await store.replaceCanonicalMetrics("AAPL", records);
    await store.replaceCanonicalMetrics("AAPL", records.filter((r) => r.fiscalYear === 2022));

    assert.deepEqual(await store.listFiscalYears("AAPL"), [2022]);
    assert.deepEqual(await store.listFiscalYears("MSFT"), []);
  });

  it("keeps trends per ticker and refreshes year ranks as a whole", async () => {
    const store = new InMemoryFinancialStore();
    await store.replaceCompanyTrends("AAPL", [
      {
        ticker: "AAPL",
        metric: "revenue",
        start_year: 2022,
        end_year: 2023,
        start_value: 100,
        end_value: 120,
        cagr: 0.2,
        direction: "up",
      },
    ]);
    await store.replaceYearRanks([{ ticker: "AAPL", fiscal_year: 2023, revenue_rank: 1, profit_rank: 1, health_rank: 1 }]);
    await store.replaceYearRanks([{ ticker: "MSFT", fiscal_year: 2023, revenue_rank: 1, profit_rank: 2, health_rank: 1 }]);

    assert.deepEqual(store.companyTrends("AAPL").map((t) => t.metric), ["revenue"]);
    assert.deepEqual(store.companyTrends("MSFT"), []);
    assert.deepEqual(store.yearRanks(), [
      { ticker: "MSFT", fiscal_year: 2023, revenue_rank: 1, profit_rank: 2, health_rank: 1 },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

describe("buildInsert", () => {
  it("numbers placeholders across rows", () => {
    const stmt = buildInsert("t", ["a", "b"], [
      [1, "x"],
      [2, null],
    ]);
    assert.deepEqual(stmt, {
      text: "INSERT INTO t (a, b) VALUES ($1, $2), ($3, $4)",
      values: [1, "x", 2, null],
    });
  });

  it("is null without rows", () => {
    assert.equal(buildInsert("t", ["a"], []), null);
  });
});

describe("row values", () => {
  it("orders canonical metric values like the column list", () => {
    const revenue = records.find((r) => r.metric === "revenue" && r.fiscalYear === 2023);
    assert.ok(revenue);
    assert.deepEqual(canonicalMetricValues(revenue), ["AAPL", 2023, "income", "revenue", 120, "Total Revenue"]);
  });

  it("writes one value per company_health column", () => {
    const flat = toFlatHealthRecord(
      scoreCompanyYear({
        ticker: "AAPL",
        fiscalYear: 2023,
        slices: { income: { revenue: 120, net_income: 30 }, balance: {}, cashFlow: {} },
        priorTotals: { revenue: 100, netIncome: 25 },
      }),
    );
    const values = companyHealthValues(flat);
    assert.equal(values.length, COMPANY_HEALTH_COLUMNS.length);
    assert.equal(values[0], "AAPL");
    assert.equal(values[COMPANY_HEALTH_COLUMNS.indexOf("net_margin")], 0.25);
    assert.equal(values[COMPANY_HEALTH_COLUMNS.indexOf("revenue_growth")], 0.2);
  });

  it("orders trend and year rank values like their column lists", () => {
    assert.deepEqual(
      companyTrendValues({
        ticker: "AAPL",
        metric: "net_income",
        start_year: null,
        end_year: null,
        start_value: null,
        end_value: null,
        cagr: null,
        direction: "insufficient_data",
      }),
      ["AAPL", "net_income", null, null, null, null, null, "insufficient_data"],
    );
    assert.deepEqual(
      yearRankValues({ ticker: "AAPL", fiscal_year: 2023, revenue_rank: 3, profit_rank: 1, health_rank: 2 }),
      ["AAPL", 2023, 3, 1, 2],
    );
  });

  it("creates the trend and year rank tables", () => {
    assert.ok(SCHEMA_SQL.includes("CREATE TABLE IF NOT EXISTS company_trends ("));
    assert.ok(SCHEMA_SQL.includes("CREATE TABLE IF NOT EXISTS company_year_ranks ("));
  });
});

describe("rowsToSlices / rowsToYearTotals", () => {
  const rows = [
    { statement: "income", metric: "revenue", value: 120 },
    { statement: "balance", metric: "total_assets", value: 400 },
    { statement: "cash_flow", metric: "free_cash_flow", value: null },
    { statement: "income", metric: "legacy_metric", value: 1 },
    { statement: "balance", metric: "revenue", value: 5 },
  ];

  it("rebuilds slices and ignores unknown or misplaced metrics", () => {
    assert.deepEqual(rowsToSlices(rows), {
      income: { revenue: 120 },
      balance: { total_assets: 400 },
      cashFlow: { free_cash_flow: null },
    });
  });

  it("reads revenue and net income", () => {
    assert.deepEqual(rowsToYearTotals(rows), { revenue: 120, netIncome: null });
    assert.equal(rowsToYearTotals([]), null);
  });
});
