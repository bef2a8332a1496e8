/**
 * Health Scorer — Point accumulation (persisted health_score).
 *
 * Each tracked ratio awards points from descending bands up to its own
 * maximum. Score = awarded / possible × 100 over the ratios actually present,
 * rounded to 2 decimals. The per-metric maxima encode category importance;
 * no separate category weight is applied.
 *
 * No ratio present → score 0 (status Poor), observedMetrics 0.
 */

import { finiteOrNull } from "@/lib/ratios/explain";
import type { RatioValues } from "@/lib/ratios/types";
import { awardPoints } from "./bands";
import { DEFAULT_SCORING_CONFIG } from "./config";
import { roundTo } from "./round";
import { classifyHealthStatus } from "./status";
import {
  HEALTH_CATEGORIES,
  type CategoryScore,
  type PointAccumulationResult,
  type RatioCategory,
  type ScoringConfig,
} from "./types";

interface Tally {
  awarded: number;
  possible: number;
  observed: number;
}

export function scorePointAccumulation(
  ratios: RatioValues,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): PointAccumulationResult {
  const byCategory = new Map<RatioCategory, Tally>();
  const total: Tally = { awarded: 0, possible: 0, observed: 0 };

  for (const rule of config.pointRules) {
    const value = finiteOrNull(ratios[rule.ratio]);
    if (value === null) continue;

    const points = awardPoints(rule, value);
    const tally = byCategory.get(rule.category) ?? { awarded: 0, possible: 0, observed: 0 };
    tally.awarded += points;
    tally.possible += rule.maxPoints;
    tally.observed += 1;
    byCategory.set(rule.category, tally);

    total.awarded += points;
    total.possible += rule.maxPoints;
    total.observed += 1;
  }

  const overallScore = total.possible > 0 ? roundTo((total.awarded / total.possible) * 100, 2) : 0;

  const categoryScores: CategoryScore[] = HEALTH_CATEGORIES.map((category) => {
    const tally = category === "growth" ? undefined : byCategory.get(category);
    if (!tally || tally.possible === 0) return { category, score: null, observed: 0 };
    return {
      category,
      score: roundTo((tally.awarded / tally.possible) * 100, 2),
      observed: tally.observed,
    };
  });

  return {
    scorer: "point_accumulation",
    overallScore,
    status: classifyHealthStatus(overallScore, config.statusBreakpoints),
    categoryScores,
    observedMetrics: total.observed,
    awardedPoints: total.awarded,
    possiblePoints: total.possible,
  };
}
