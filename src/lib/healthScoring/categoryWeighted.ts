/**
 * Health Scorer — Category-weighted (analyzer view).
 *
 * Each ratio is scored on the 5-band scale, averaged within its category, and
 * categories are combined with fixed weights renormalized over the categories
 * actually present. A ratio category with no observed ratio is excluded (it
 * changes the denominator); the growth category instead falls back to a
 * neutral score.
 *
 * No observed ratio → overallScore undefined, status Unknown. Growth rates
 * alone never produce a grade.
 */

import { scoreGrowthCategory } from "@/lib/growth/growth";
import type { GrowthRates } from "@/lib/growth/types";
import type { RatioValues } from "@/lib/ratios/types";
import { scoreMetric } from "./bands";
import { DEFAULT_SCORING_CONFIG } from "./config";
import { roundTo } from "./round";
import { classifyHealthStatus } from "./status";
import {
  HEALTH_CATEGORIES,
  type CategoryScore,
  type CategoryWeightedResult,
  type HealthCategory,
  type RatioCategory,
  type ScoringConfig,
} from "./types";

// ---------------------------------------------------------------------------
// Weighted combination
// ---------------------------------------------------------------------------

export interface CombinedScore {
  overallScore: number | undefined;
  appliedWeights: Partial<Record<HealthCategory, number>>;
}

/**
 * Weighted mean of the present category scores, weights renormalized to sum
 * to 1 over those categories. Rounded to 1 decimal.
 */
export function combineCategoryScores(
  scores: Partial<Record<HealthCategory, number>>,
  weights: Readonly<Record<HealthCategory, number>> = DEFAULT_SCORING_CONFIG.categoryWeights,
): CombinedScore {
  let weighted = 0;
  let totalWeight = 0;

  for (const category of HEALTH_CATEGORIES) {
    const score = scores[category];
    if (score === undefined) continue;
    weighted += score * weights[category];
    totalWeight += weights[category];
  }

  if (totalWeight <= 0) return { overallScore: undefined, appliedWeights: {} };

  const appliedWeights: Partial<Record<HealthCategory, number>> = {};
  for (const category of HEALTH_CATEGORIES) {
    if (scores[category] !== undefined) appliedWeights[category] = weights[category] / totalWeight;
  }

  return { overallScore: roundTo(weighted / totalWeight, 1), appliedWeights };
}

// ---------------------------------------------------------------------------
// Category scores
// ---------------------------------------------------------------------------

function scoreRatioCategory(
  category: RatioCategory,
  ratios: RatioValues,
  config: ScoringConfig,
): CategoryScore {
  const scores: number[] = [];
  for (const ratio of config.categoryMembers[category]) {
    const s = scoreMetric(ratio, ratios[ratio], config);
    if (s !== null) scores.push(s);
  }

  if (scores.length === 0) return { category, score: null, observed: 0 };
  return {
    category,
    score: scores.reduce((sum, s) => sum + s, 0) / scores.length,
    observed: scores.length,
  };
}

// ---------------------------------------------------------------------------
// Main entry
// ---------------------------------------------------------------------------

export function scoreCategoryWeighted(
  ratios: RatioValues,
  growth: GrowthRates | null | undefined,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): CategoryWeightedResult {
  const ratioCategories: CategoryScore[] = [
    scoreRatioCategory("liquidity", ratios, config),
    scoreRatioCategory("profitability", ratios, config),
    scoreRatioCategory("leverage", ratios, config),
    scoreRatioCategory("cash_flow", ratios, config),
  ];
  const growthResult = scoreGrowthCategory(growth, config.growth);

  const observedRatios = ratioCategories.reduce((sum, c) => sum + c.observed, 0);
  const observedMetrics = observedRatios + growthResult.observed;

  if (observedRatios === 0) {
    return {
      scorer: "category_weighted",
      overallScore: undefined,
      status: "Unknown",
      categoryScores: HEALTH_CATEGORIES.map((category) => ({ category, score: null, observed: 0 })),
      observedMetrics: 0,
      appliedWeights: {},
    };
  }

  const categoryScores: CategoryScore[] = [
    ...ratioCategories,
    { category: "growth", score: growthResult.score, observed: growthResult.observed },
  ];

  const present: Partial<Record<HealthCategory, number>> = {};
  for (const c of categoryScores) {
    if (c.score !== null) present[c.category] = c.score;
  }

  const { overallScore, appliedWeights } = combineCategoryScores(present, config.categoryWeights);

  return {
    scorer: "category_weighted",
    overallScore,
    status: classifyHealthStatus(overallScore, config.statusBreakpoints),
    categoryScores,
    observedMetrics,
    appliedWeights,
  };
}
