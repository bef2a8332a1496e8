/**
 * Postgres row shapes and pure row mapping for PgFinancialStore.
 */

import type { YearTotals } from "@/lib/growth/types";
import { emptySlices, isBalanceMetric, isCashFlowMetric, isIncomeMetric } from "@/lib/metricNormalizer/normalize";
import type { CanonicalMetricRecord, CanonicalMetricSlices } from "@/lib/metricNormalizer/types";
import type { FlatHealthRecord, FlatTrendRecord, YearRankRecord } from "@/lib/pipeline/types";

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS canonical_metrics (
  ticker        text             NOT NULL,
  fiscal_year   integer          NOT NULL,
  statement     text             NOT NULL,
  metric        text             NOT NULL,
  value         double precision,
  source_label  text             NOT NULL,
  PRIMARY KEY (ticker, fiscal_year, metric)
);

CREATE TABLE IF NOT EXISTS company_health (
  ticker                    text             NOT NULL,
  fiscal_year               integer          NOT NULL,
  current_ratio             double precision,
  quick_ratio               double precision,
  cash_ratio                double precision,
  gross_margin              double precision,
  operating_margin          double precision,
  net_margin                double precision,
  roe                       double precision,
  roa                       double precision,
  debt_to_equity            double precision,
  debt_to_assets            double precision,
  asset_turnover            double precision,
  operating_cash_flow_ratio double precision,
  free_cash_flow_margin     double precision,
  revenue_growth            double precision,
  profit_growth             double precision,
  liquidity_score           double precision,
  profitability_score       double precision,
  leverage_score            double precision,
  cash_flow_score           double precision,
  growth_score              double precision,
  overall_score             double precision,
  overall_status            text             NOT NULL,
  health_score              double precision NOT NULL,
  health_status             text             NOT NULL,
  analysis_notes            text             NOT NULL,
  computed_at               timestamptz      NOT NULL DEFAULT now(),
  PRIMARY KEY (ticker, fiscal_year)
);

CREATE TABLE IF NOT EXISTS company_trends (
  ticker       text             NOT NULL,
  metric       text             NOT NULL,
  start_year   integer,
  end_year     integer,
  start_value  double precision,
  end_value    double precision,
  cagr         double precision,
  direction    text             NOT NULL,
  PRIMARY KEY (ticker, metric)
);

CREATE TABLE IF NOT EXISTS company_year_ranks (
  ticker        text    NOT NULL,
  fiscal_year   integer NOT NULL,
  revenue_rank  integer NOT NULL,
  profit_rank   integer NOT NULL,
  health_rank   integer NOT NULL,
  PRIMARY KEY (ticker, fiscal_year)
);
`;

export type CanonicalMetricRow = {
  statement: string;
  metric: string;
  value: number | null;
};

export const CANONICAL_METRIC_COLUMNS = [
  "ticker",
  "fiscal_year",
  "statement",
  "metric",
  "value",
  "source_label",
] as const;

export const COMPANY_HEALTH_COLUMNS = [
  "ticker",
  "fiscal_year",
  "current_ratio",
  "quick_ratio",
  "cash_ratio",
  "gross_margin",
  "operating_margin",
  "net_margin",
  "roe",
  "roa",
  "debt_to_equity",
  "debt_to_assets",
  "asset_turnover",
  "operating_cash_flow_ratio",
  "free_cash_flow_margin",
  "revenue_growth",
  "profit_growth",
  "liquidity_score",
  "profitability_score",
  "leverage_score",
  "cash_flow_score",
  "growth_score",
  "overall_score",
  "overall_status",
  "health_score",
  "health_status",
  "analysis_notes",
] as const satisfies readonly (keyof FlatHealthRecord)[];

export const COMPANY_TREND_COLUMNS = [
  "ticker",
  "metric",
  "start_year",
  "end_year",
  "start_value",
  "end_value",
  "cagr",
  "direction",
] as const satisfies readonly (keyof FlatTrendRecord)[];

export const YEAR_RANK_COLUMNS = [
  "ticker",
  "fiscal_year",
  "revenue_rank",
  "profit_rank",
  "health_rank",
] as const satisfies readonly (keyof YearRankRecord)[];

export interface InsertStatement {
  text: string;
  values: unknown[];
}

/** Multi-row parameterized INSERT; null when there are no rows. */
export function buildInsert(
  table: string,
  columns: readonly string[],
  rows: readonly (readonly unknown[])[],
): InsertStatement | null {
  if (rows.length === 0) return null;

  const values: unknown[] = [];
  const tuples = rows.map((row) => {
    const placeholders = row.map((v) => {
      values.push(v);
      return `$${values.length}`;
    });
    return `(${placeholders.join(", ")})`;
  });

  return {
    text: `INSERT INTO ${table} (${columns.join(", ")}) VALUES ${tuples.join(", ")}`,
    values,
  };
}

export function canonicalMetricValues(record: CanonicalMetricRecord): unknown[] {
  return [record.ticker, record.fiscalYear, record.statement, record.metric, record.value, record.sourceLabel];
}

export function companyHealthValues(record: FlatHealthRecord): unknown[] {
  return COMPANY_HEALTH_COLUMNS.map((column) => record[column]);
}

export function companyTrendValues(record: FlatTrendRecord): unknown[] {
  return COMPANY_TREND_COLUMNS.map((column) => record[column]);
}

export function yearRankValues(record: YearRankRecord): unknown[] {
  return YEAR_RANK_COLUMNS.map((column) => record[column]);
}

/** Rows of one (ticker, fiscal year) back into ratio-calculator slices. Unknown metric names are ignored. */
export function rowsToSlices(rows: readonly CanonicalMetricRow[]): CanonicalMetricSlices {
  const slices = emptySlices();
  for (const { statement, metric, value } of rows) {
    if (statement === "income" && isIncomeMetric(metric)) slices.income[metric] = value;
    else if (statement === "balance" && isBalanceMetric(metric)) slices.balance[metric] = value;
    else if (statement === "cash_flow" && isCashFlowMetric(metric)) slices.cashFlow[metric] = value;
  }
  return slices;
}

/** null when the year has no rows at all. */
export function rowsToYearTotals(rows: readonly CanonicalMetricRow[]): YearTotals | null {
  if (rows.length === 0) return null;
  return {
    revenue: rows.find((r) => r.metric === "revenue")?.value ?? null,
    netIncome: rows.find((r) => r.metric === "net_income")?.value ?? null,
  };
}
