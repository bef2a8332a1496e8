/**
 * Health Scorer — Public API
 */

export type {
  BandScores,
  BandThresholds,
  CategoryScore,
  CategoryWeightedResult,
  HealthAssessment,
  HealthCategory,
  HealthStatus,
  MetricDirection,
  PointAccumulationResult,
  PointBand,
  PointRule,
  RatioCategory,
  ScoreResult,
  Scorer,
  ScorerKind,
  ScoringConfig,
  ScoringInput,
  StatusBreakpoint,
} from "./types";
export { HEALTH_CATEGORIES } from "./types";

export { DEFAULT_SCORING_CONFIG } from "./config";
export { awardPoints, scoreMetric } from "./bands";
export { classifyHealthStatus, isHealthy } from "./status";
export { scorePointAccumulation } from "./pointAccumulation";
export { combineCategoryScores, scoreCategoryWeighted } from "./categoryWeighted";
export type { CombinedScore } from "./categoryWeighted";
export { createCategoryWeightedScorer, createPointAccumulationScorer, createScorer } from "./scorer";
