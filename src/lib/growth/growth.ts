/**
 * Growth & Trend Evaluator
 *
 * Year-over-year growth, the growth category score, and multi-year CAGR trends.
 *
 * With no growth rate available the growth category takes the table's neutral
 * score instead of dropping out.
 */

import { finiteOrNull } from "@/lib/ratios/explain";
import { deepFreeze } from "@/lib/utils/deepFreeze";
import type {
  GrowthBand,
  GrowthCategoryResult,
  GrowthRates,
  GrowthScoringTable,
  MetricTrend,
  TrendDirection,
  TrendPoint,
  YearTotals,
} from "./types";

// ---------------------------------------------------------------------------
// Bands (strict "greater than" comparisons, best first)
// ---------------------------------------------------------------------------

export const DEFAULT_GROWTH_SCORING: GrowthScoringTable = deepFreeze({
  revenueBands: [
    { above: 0.2, score: 100 },
    { above: 0.1, score: 75 },
    { above: 0, score: 50 },
  ],
  profitBands: [
    { above: 0.15, score: 100 },
    { above: 0, score: 75 },
    { above: -0.1, score: 50 },
  ],
  floorScore: 25,
  neutralScore: 50,
});

/** |CAGR| at or below this counts as flat. */
export const FLAT_TREND_BAND = 0.01;
export const DEFAULT_TREND_WINDOW = 5;

// ---------------------------------------------------------------------------
// Growth rates
// ---------------------------------------------------------------------------

/** (current - previous) / |previous|; null when either side is missing or previous is 0. */
export function growthRate(
  current: number | null | undefined,
  previous: number | null | undefined,
): number | null {
  const cur = finiteOrNull(current);
  const prev = finiteOrNull(previous);
  if (cur === null || prev === null || prev === 0) return null;
  return finiteOrNull((cur - prev) / Math.abs(prev));
}

export function computeGrowthRates(current: YearTotals, previous: YearTotals | null): GrowthRates {
  return {
    revenue_growth: growthRate(current.revenue, previous?.revenue),
    profit_growth: growthRate(current.netIncome, previous?.netIncome),
  };
}

// ---------------------------------------------------------------------------
// Growth category
// ---------------------------------------------------------------------------

/** Index of the first band the value clears; `bands.length` when it clears none. */
export function growthBandIndex(value: number, bands: readonly GrowthBand[]): number {
  const index = bands.findIndex((band) => value > band.above);
  return index === -1 ? bands.length : index;
}

function bandScore(value: number, bands: readonly GrowthBand[], floorScore: number): number {
  return bands[growthBandIndex(value, bands)]?.score ?? floorScore;
}

export function scoreRevenueGrowth(value: number, table: GrowthScoringTable = DEFAULT_GROWTH_SCORING): number {
  return bandScore(value, table.revenueBands, table.floorScore);
}

export function scoreProfitGrowth(value: number, table: GrowthScoringTable = DEFAULT_GROWTH_SCORING): number {
  return bandScore(value, table.profitBands, table.floorScore);
}

export function scoreGrowthCategory(
  growth: GrowthRates | null | undefined,
  table: GrowthScoringTable = DEFAULT_GROWTH_SCORING,
): GrowthCategoryResult {
  const scores: number[] = [];
  const revenue = finiteOrNull(growth?.revenue_growth);
  const profit = finiteOrNull(growth?.profit_growth);

  if (revenue !== null) scores.push(scoreRevenueGrowth(revenue, table));
  if (profit !== null) scores.push(scoreProfitGrowth(profit, table));

  if (scores.length === 0) return { score: table.neutralScore, observed: 0 };
  return {
    score: scores.reduce((sum, s) => sum + s, 0) / scores.length,
    observed: scores.length,
  };
}

// ---------------------------------------------------------------------------
// Multi-year trend
// ---------------------------------------------------------------------------

function directionFromDelta(delta: number, band: number): TrendDirection {
  if (delta > band) return "up";
  if (delta < -band) return "down";
  return "flat";
}

/**
 * Trend of one metric over the most recent `window` fiscal years.
 *
 * CAGR = (last / first)^(1 / yearsSpanned) - 1, defined only when the first
 * value is positive and the last is non-negative. Without a CAGR the
 * direction falls back to the sign of last - first.
 */
export function computeMetricTrend(
  metric: string,
  series: readonly TrendPoint[],
  window: number = DEFAULT_TREND_WINDOW,
): MetricTrend {
  const points = series
    .flatMap((p) => {
      const value = finiteOrNull(p.value);
      return value === null ? [] : [{ fiscalYear: p.fiscalYear, value }];
    })
    .sort((a, b) => a.fiscalYear - b.fiscalYear)
    .slice(-window);

  const first = points[0];
  const last = points[points.length - 1];
  if (!first || !last || points.length < 2) {
    return { metric, points, cagr: null, direction: "insufficient_data" };
  }

  const yearsSpanned = last.fiscalYear - first.fiscalYear;
  if (first.value <= 0 || last.value < 0 || yearsSpanned <= 0) {
    const delta = last.value - first.value;
    return { metric, points, cagr: null, direction: directionFromDelta(delta, 0) };
  }

  const cagr = finiteOrNull(Math.pow(last.value / first.value, 1 / yearsSpanned) - 1);
  return {
    metric,
    points,
    cagr,
    direction: cagr === null ? "insufficient_data" : directionFromDelta(cagr, FLAT_TREND_BAND),
  };
}
