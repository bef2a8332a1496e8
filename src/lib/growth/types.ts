/**
 * Growth & Trend Evaluator — Shared Types
 */

/** Revenue and net income for one fiscal year, the inputs to growth rates. */
export interface YearTotals {
  revenue: number | null;
  netIncome: number | null;
}

export interface GrowthRates {
  revenue_growth: number | null;
  profit_growth: number | null;
}

/** Scores a growth rate strictly above `above`. */
export interface GrowthBand {
  above: number;
  score: number;
}

export interface GrowthScoringTable {
  /** Best band first */
  revenueBands: readonly GrowthBand[];
  /** Best band first */
  profitBands: readonly GrowthBand[];
  /** Score for a rate that clears no band */
  floorScore: number;
  /** Category score when no growth rate is available */
  neutralScore: number;
}

export interface GrowthCategoryResult {
  score: number;
  /** Growth rates that contributed; 0 means the neutral default was used */
  observed: number;
}

// ---------------------------------------------------------------------------
// Multi-year trend
// ---------------------------------------------------------------------------

export interface TrendPoint {
  fiscalYear: number;
  value: number | null;
}

export type TrendDirection = "up" | "down" | "flat" | "insufficient_data";

export interface MetricTrend {
  metric: string;
  /** Oldest first, at most the trend window */
  points: Array<{ fiscalYear: number; value: number }>;
  cagr: number | null;
  direction: TrendDirection;
}
