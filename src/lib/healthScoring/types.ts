/**
 * Health Scorer — Shared Types
 */

import type { GrowthRates, GrowthScoringTable } from "@/lib/growth/types";
import type { RatioName, RatioValues } from "@/lib/ratios/types";

// ---------------------------------------------------------------------------
// Categories & status
// ---------------------------------------------------------------------------

export const HEALTH_CATEGORIES = [
  "liquidity",
  "profitability",
  "leverage",
  "cash_flow",
  "growth",
] as const;

export type HealthCategory = (typeof HEALTH_CATEGORIES)[number];

/** Categories fed by balance-sheet / income / cash-flow ratios. */
export type RatioCategory = Exclude<HealthCategory, "growth">;

export type HealthStatus = "Excellent" | "Good" | "Fair" | "Concerning" | "Poor" | "Unknown";

export interface StatusBreakpoint {
  minScore: number;
  status: Exclude<HealthStatus, "Unknown">;
}

// ---------------------------------------------------------------------------
// Threshold definitions
// ---------------------------------------------------------------------------

export type MetricDirection = "higher_is_better" | "lower_is_better";

/** Named band cutoffs for the category-weighted scheme. */
export interface BandThresholds {
  direction: MetricDirection;
  excellent: number;
  good: number;
  fair: number;
  poor: number;
}

export interface BandScores {
  excellent: number;
  good: number;
  fair: number;
  poor: number;
  /** Below the poor cutoff */
  floor: number;
}

export interface PointBand {
  /** Inclusive cutoff on the "good" side of the direction */
  threshold: number;
  points: number;
}

/** One tracked ratio in the point-accumulation scheme. */
export interface PointRule {
  ratio: RatioName;
  category: RatioCategory;
  direction: MetricDirection;
  maxPoints: number;
  /** Best band first; a value matching no band earns 0 */
  bands: readonly PointBand[];
}

export interface ScoringConfig {
  bandThresholds: Readonly<Partial<Record<RatioName, BandThresholds>>>;
  bandScores: BandScores;
  categoryMembers: Readonly<Record<RatioCategory, readonly RatioName[]>>;
  categoryWeights: Readonly<Record<HealthCategory, number>>;
  pointRules: readonly PointRule[];
  statusBreakpoints: readonly StatusBreakpoint[];
  /** Growth bands, floor and neutral score */
  growth: GrowthScoringTable;
}

// ---------------------------------------------------------------------------
// Results
// ---------------------------------------------------------------------------

export interface CategoryScore {
  category: HealthCategory;
  /** null when no sub-metric was observed and the category was excluded */
  score: number | null;
  observed: number;
}

export type ScorerKind = "point_accumulation" | "category_weighted";

export interface ScoringInput {
  ratios: RatioValues;
  growth?: GrowthRates | null;
}

export interface ScoreResult {
  scorer: ScorerKind;
  overallScore: number | undefined;
  status: HealthStatus;
  /** All five categories, in HEALTH_CATEGORIES order */
  categoryScores: CategoryScore[];
  /** Sub-metrics that contributed to the score */
  observedMetrics: number;
}

export interface PointAccumulationResult extends ScoreResult {
  scorer: "point_accumulation";
  overallScore: number;
  awardedPoints: number;
  possiblePoints: number;
}

export interface CategoryWeightedResult extends ScoreResult {
  scorer: "category_weighted";
  /** Renormalized weight actually applied to each present category */
  appliedWeights: Partial<Record<HealthCategory, number>>;
}

export interface Scorer {
  readonly kind: ScorerKind;
  score(input: ScoringInput): ScoreResult;
}

// ---------------------------------------------------------------------------
// Assessment
// ---------------------------------------------------------------------------

/** One per (ticker, fiscal year); replaced wholesale on recomputation. */
export interface HealthAssessment {
  readonly ticker: string;
  readonly fiscalYear: number;
  readonly scorer: ScorerKind;
  readonly categoryScores: readonly CategoryScore[];
  readonly overallScore: number | undefined;
  readonly status: HealthStatus;
  readonly notes: readonly string[];
}
