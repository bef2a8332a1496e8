/**
 * Health Scorer — Default scoring configuration.
 *
 * Centralized thresholds, point bands and weights for both scorers.
 * No hard-coded numbers in the scoring logic — all tables here. The default
 * table is deep-frozen; pass a different ScoringConfig to createScorer to
 * override it.
 */

import { DEFAULT_GROWTH_SCORING } from "@/lib/growth/growth";
import { deepFreeze } from "@/lib/utils/deepFreeze";
import type { ScoringConfig } from "./types";

// ---------------------------------------------------------------------------
// Category-weighted scheme: named band thresholds
// ---------------------------------------------------------------------------

const BAND_THRESHOLDS: ScoringConfig["bandThresholds"] = {
  // Liquidity
  current_ratio: { direction: "higher_is_better", excellent: 2.0, good: 1.5, fair: 1.0, poor: 0.5 },
  quick_ratio: { direction: "higher_is_better", excellent: 1.5, good: 1.0, fair: 0.7, poor: 0.3 },
  cash_ratio: { direction: "higher_is_better", excellent: 0.5, good: 0.3, fair: 0.15, poor: 0.05 },

  // Profitability
  gross_margin: { direction: "higher_is_better", excellent: 0.5, good: 0.35, fair: 0.2, poor: 0.1 },
  operating_margin: { direction: "higher_is_better", excellent: 0.25, good: 0.15, fair: 0.08, poor: 0.0 },
  net_margin: { direction: "higher_is_better", excellent: 0.2, good: 0.1, fair: 0.05, poor: 0.0 },
  roe: { direction: "higher_is_better", excellent: 0.2, good: 0.15, fair: 0.1, poor: 0.05 },
  roa: { direction: "higher_is_better", excellent: 0.15, good: 0.1, fair: 0.05, poor: 0.02 },

  // Leverage
  debt_to_equity: { direction: "lower_is_better", excellent: 0.5, good: 1.0, fair: 2.0, poor: 3.0 },
  debt_to_assets: { direction: "lower_is_better", excellent: 0.3, good: 0.5, fair: 0.6, poor: 0.7 },

  // Cash flow
  operating_cash_flow_ratio: { direction: "higher_is_better", excellent: 1.0, good: 0.6, fair: 0.3, poor: 0.1 },
  free_cash_flow_margin: { direction: "higher_is_better", excellent: 0.15, good: 0.1, fair: 0.05, poor: 0.0 },
};

// quick_ratio is banded but not a category member: under the default
// quick-ratio policy it equals current_ratio and would count twice.
const CATEGORY_MEMBERS: ScoringConfig["categoryMembers"] = {
  liquidity: ["current_ratio", "cash_ratio"],
  profitability: ["gross_margin", "operating_margin", "net_margin", "roe", "roa"],
  leverage: ["debt_to_equity", "debt_to_assets"],
  cash_flow: ["operating_cash_flow_ratio", "free_cash_flow_margin"],
};

const CATEGORY_WEIGHTS: ScoringConfig["categoryWeights"] = {
  liquidity: 0.15,
  profitability: 0.3,
  leverage: 0.2,
  cash_flow: 0.2,
  growth: 0.15,
};

// ---------------------------------------------------------------------------
// Point-accumulation scheme
// Nominal maxima: liquidity 20, profitability 30, leverage 25, cash flow 25.
// ---------------------------------------------------------------------------

const POINT_RULES: ScoringConfig["pointRules"] = [
  {
    ratio: "current_ratio",
    category: "liquidity",
    direction: "higher_is_better",
    maxPoints: 10,
    bands: [
      { threshold: 2.0, points: 10 },
      { threshold: 1.5, points: 8 },
      { threshold: 1.0, points: 5 },
      { threshold: 0.5, points: 2 },
    ],
  },
  {
    ratio: "cash_ratio",
    category: "liquidity",
    direction: "higher_is_better",
    maxPoints: 10,
    bands: [
      { threshold: 0.5, points: 10 },
      { threshold: 0.25, points: 7 },
      { threshold: 0.1, points: 4 },
    ],
  },
  {
    ratio: "net_margin",
    category: "profitability",
    direction: "higher_is_better",
    maxPoints: 15,
    bands: [
      { threshold: 0.2, points: 15 },
      { threshold: 0.1, points: 12 },
      { threshold: 0.05, points: 8 },
      { threshold: 0, points: 4 },
    ],
  },
  {
    ratio: "roe",
    category: "profitability",
    direction: "higher_is_better",
    maxPoints: 15,
    bands: [
      { threshold: 0.2, points: 15 },
      { threshold: 0.15, points: 12 },
      { threshold: 0.1, points: 8 },
      { threshold: 0, points: 4 },
    ],
  },
  {
    ratio: "debt_to_equity",
    category: "leverage",
    direction: "lower_is_better",
    maxPoints: 15,
    bands: [
      { threshold: 0.5, points: 15 },
      { threshold: 1.0, points: 12 },
      { threshold: 2.0, points: 8 },
      { threshold: 3.0, points: 4 },
    ],
  },
  {
    ratio: "debt_to_assets",
    category: "leverage",
    direction: "lower_is_better",
    maxPoints: 10,
    bands: [
      { threshold: 0.3, points: 10 },
      { threshold: 0.5, points: 7 },
      { threshold: 0.7, points: 4 },
    ],
  },
  {
    ratio: "operating_cash_flow_ratio",
    category: "cash_flow",
    direction: "higher_is_better",
    maxPoints: 15,
    bands: [
      { threshold: 1.0, points: 15 },
      { threshold: 0.5, points: 10 },
      { threshold: 0.2, points: 5 },
    ],
  },
  {
    ratio: "free_cash_flow_margin",
    category: "cash_flow",
    direction: "higher_is_better",
    maxPoints: 10,
    bands: [
      { threshold: 0.15, points: 10 },
      { threshold: 0.1, points: 7 },
      { threshold: 0.05, points: 4 },
      { threshold: 0, points: 2 },
    ],
  },
];

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

export const DEFAULT_SCORING_CONFIG: ScoringConfig = deepFreeze({
  bandThresholds: BAND_THRESHOLDS,
  bandScores: { excellent: 100, good: 75, fair: 50, poor: 25, floor: 10 },
  categoryMembers: CATEGORY_MEMBERS,
  categoryWeights: CATEGORY_WEIGHTS,
  pointRules: POINT_RULES,
  statusBreakpoints: [
    { minScore: 80, status: "Excellent" },
    { minScore: 65, status: "Good" },
    { minScore: 50, status: "Fair" },
    { minScore: 35, status: "Concerning" },
  ],
  growth: DEFAULT_GROWTH_SCORING,
});
