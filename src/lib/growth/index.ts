export type {
  GrowthBand,
  GrowthCategoryResult,
  GrowthRates,
  GrowthScoringTable,
  MetricTrend,
  TrendDirection,
  TrendPoint,
  YearTotals,
} from "./types";

export {
  computeGrowthRates,
  computeMetricTrend,
  DEFAULT_GROWTH_SCORING,
  DEFAULT_TREND_WINDOW,
  FLAT_TREND_BAND,
  growthBandIndex,
  growthRate,
  scoreGrowthCategory,
  scoreProfitGrowth,
  scoreRevenueGrowth,
} from "./growth";
