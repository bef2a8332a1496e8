/**
 * Health Scorer — Scorer strategies.
 *
 * The two schemes serve different consumers and are kept separate:
 * - point_accumulation: persisted / dashboard health_score
 * - category_weighted: analyzer view with growth and narrative notes
 */

import { scoreCategoryWeighted } from "./categoryWeighted";
import { DEFAULT_SCORING_CONFIG } from "./config";
import { scorePointAccumulation } from "./pointAccumulation";
import type { ScoreResult, Scorer, ScorerKind, ScoringConfig, ScoringInput } from "./types";

export function createPointAccumulationScorer(config: ScoringConfig = DEFAULT_SCORING_CONFIG): Scorer {
  return {
    kind: "point_accumulation",
    // Growth is not part of this scheme.
    score: (input: ScoringInput): ScoreResult => scorePointAccumulation(input.ratios, config),
  };
}

export function createCategoryWeightedScorer(config: ScoringConfig = DEFAULT_SCORING_CONFIG): Scorer {
  return {
    kind: "category_weighted",
    score: (input: ScoringInput): ScoreResult => scoreCategoryWeighted(input.ratios, input.growth, config),
  };
}

export function createScorer(kind: ScorerKind, config: ScoringConfig = DEFAULT_SCORING_CONFIG): Scorer {
  switch (kind) {
    case "point_accumulation":
      return createPointAccumulationScorer(config);
    case "category_weighted":
      return createCategoryWeightedScorer(config);
  }
}
