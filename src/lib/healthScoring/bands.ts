/**
 * Health Scorer — Band lookups.
 *
 * Direction is resolved from the threshold definition, never passed at the
 * call site. Boundaries are inclusive on the "good" side.
 */

import { finiteOrNull } from "@/lib/ratios/explain";
import type { RatioName } from "@/lib/ratios/types";
import { DEFAULT_SCORING_CONFIG } from "./config";
import type { MetricDirection, PointRule, ScoringConfig } from "./types";

function meets(value: number, threshold: number, direction: MetricDirection): boolean {
  return direction === "higher_is_better" ? value >= threshold : value <= threshold;
}

/**
 * Score one ratio on the 5-band scale (100/75/50/25/10 by default).
 * Returns null when the value is missing or the ratio has no thresholds.
 */
export function scoreMetric(
  ratio: RatioName,
  value: number | null | undefined,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): number | null {
  const v = finiteOrNull(value);
  const t = config.bandThresholds[ratio];
  if (v === null || !t) return null;

  const scores = config.bandScores;
  if (meets(v, t.excellent, t.direction)) return scores.excellent;
  if (meets(v, t.good, t.direction)) return scores.good;
  if (meets(v, t.fair, t.direction)) return scores.fair;
  if (meets(v, t.poor, t.direction)) return scores.poor;
  return scores.floor;
}

/** Points earned by one ratio under a point rule; 0 when no band matches. */
export function awardPoints(rule: PointRule, value: number): number {
  for (const band of rule.bands) {
    if (meets(value, band.threshold, rule.direction)) return band.points;
  }
  return 0;
}
