/**
 * Ranking — order companies by health score.
 *
 * Score descending, ties broken by ticker ascending. Companies without a
 * score are listed last (ticker order) and carry no rank.
 */

import { isHealthy } from "@/lib/healthScoring/status";
import { roundTo } from "@/lib/healthScoring/round";

export interface RankableCompany {
  ticker: string;
  score: number | undefined;
}

export type Ranked<T extends RankableCompany> = T & { rank: number | null };

export interface RankingSummary {
  scored: number;
  healthyCount: number;
  /** Mean of the scored companies, 1 decimal; undefined when none scored */
  averageScore: number | undefined;
  unscored: string[];
}

function compareTickers(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function hasScore(score: number | undefined): score is number {
  return typeof score === "number" && Number.isFinite(score);
}

export function compareByScore(a: RankableCompany, b: RankableCompany): number {
  const aScored = hasScore(a.score);
  const bScored = hasScore(b.score);
  if (aScored && bScored && a.score !== b.score) return (b.score ?? 0) - (a.score ?? 0);
  if (aScored !== bScored) return aScored ? -1 : 1;
  return compareTickers(a.ticker, b.ticker);
}

export function rankCompanies<T extends RankableCompany>(entries: readonly T[]): Ranked<T>[] {
  const sorted = [...entries].sort(compareByScore);
  let position = 0;
  return sorted.map((entry) => {
    if (!hasScore(entry.score)) return { ...entry, rank: null };
    position += 1;
    return { ...entry, rank: position };
  });
}

export function summarizeRanking(entries: readonly RankableCompany[]): RankingSummary {
  const scores: number[] = [];
  const unscored: string[] = [];
  for (const e of entries) {
    if (hasScore(e.score)) scores.push(e.score);
    else unscored.push(e.ticker);
  }

  const total = scores.reduce((sum, s) => sum + s, 0);
  return {
    scored: scores.length,
    healthyCount: scores.filter((s) => isHealthy(s)).length,
    averageScore: scores.length > 0 ? roundTo(total / scores.length, 1) : undefined,
    unscored: unscored.sort(compareTickers),
  };
}
