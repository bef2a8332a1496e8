import { computeMetricTrend, DEFAULT_TREND_WINDOW } from "@/lib/growth/growth";
import type { MetricTrend } from "@/lib/growth/types";
import type { CanonicalMetric, CanonicalMetricRecord } from "@/lib/metricNormalizer/types";
import type { FlatTrendRecord } from "./types";

export const TREND_METRICS = [
  "revenue",
  "net_income",
  "operating_cash_flow",
  "free_cash_flow",
] as const satisfies readonly CanonicalMetric[];

/** Multi-year trend of each tracked metric across one ticker's records. */
export function computeCompanyTrends(
  records: readonly CanonicalMetricRecord[],
  window: number = DEFAULT_TREND_WINDOW,
): MetricTrend[] {
  return TREND_METRICS.map((metric) =>
    computeMetricTrend(
      metric,
      records
        .filter((r) => r.metric === metric)
        .map((r) => ({ fiscalYear: r.fiscalYear, value: r.value })),
      window,
    ),
  );
}

export function toFlatTrendRecord(ticker: string, trend: MetricTrend): FlatTrendRecord {
  const first = trend.points[0];
  const last = trend.points[trend.points.length - 1];
  return {
    ticker,
    metric: trend.metric,
    start_year: first?.fiscalYear ?? null,
    end_year: last?.fiscalYear ?? null,
    start_value: first?.value ?? null,
    end_value: last?.value ?? null,
    cagr: trend.cagr,
    direction: trend.direction,
  };
}
