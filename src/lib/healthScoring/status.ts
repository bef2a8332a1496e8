import { DEFAULT_SCORING_CONFIG } from "./config";
import type { HealthStatus, StatusBreakpoint } from "./types";

/**
 * Status is a step function of the score. "Unknown" is reserved for a score
 * that was never computed; a numeric 0 is "Poor".
 */
export function classifyHealthStatus(
  score: number | undefined,
  breakpoints: readonly StatusBreakpoint[] = DEFAULT_SCORING_CONFIG.statusBreakpoints,
): HealthStatus {
  if (score === undefined || !Number.isFinite(score)) return "Unknown";
  for (const bp of breakpoints) {
    if (score >= bp.minScore) return bp.status;
  }
  return "Poor";
}

/** A score of at least 50 (Fair or better) counts as healthy. */
export function isHealthy(score: number | undefined): boolean {
  return score !== undefined && Number.isFinite(score) && score >= 50;
}
