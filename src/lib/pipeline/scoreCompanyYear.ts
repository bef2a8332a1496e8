/**
 * Pipeline — Score one company-year.
 *
 * Pure: slices and prior-year totals in, ratio set + both scores + narrative
 * out. Nothing here touches a collaborator.
 */

import { computeGrowthRates } from "@/lib/growth/growth";
import type { YearTotals } from "@/lib/growth/types";
import { DEFAULT_SCORING_CONFIG } from "@/lib/healthScoring/config";
import { scorePointAccumulation } from "@/lib/healthScoring/pointAccumulation";
import { createCategoryWeightedScorer } from "@/lib/healthScoring/scorer";
import type { HealthAssessment, HealthCategory } from "@/lib/healthScoring/types";
import type { CanonicalMetricSlices } from "@/lib/metricNormalizer/types";
import { generateNarrativeNotes, INSUFFICIENT_DATA_SUMMARY, summarizeNotes } from "@/lib/narrative/notes";
import { computeRatioSet } from "@/lib/ratios/ratios";
import { deepFreeze } from "@/lib/utils/deepFreeze";
import type { CompanyYearResult, FlatHealthRecord, ScoringOptions } from "./types";

export interface ScoreCompanyYearInput {
  ticker: string;
  fiscalYear: number;
  slices: CanonicalMetricSlices;
  priorTotals: YearTotals | null;
}

export function scoreCompanyYear(
  input: ScoreCompanyYearInput,
  options: ScoringOptions = {},
): CompanyYearResult {
  const config = options.config ?? DEFAULT_SCORING_CONFIG;
  const scorer = options.scorer ?? createCategoryWeightedScorer(config);
  const { ticker, fiscalYear, slices } = input;

  const ratioSet = computeRatioSet({ ticker, fiscalYear, slices, policy: options.ratioPolicy });
  const totals = { revenue: slices.income.revenue ?? null, netIncome: slices.income.net_income ?? null };
  const growth = computeGrowthRates(totals, input.priorTotals);

  const healthScore = scorePointAccumulation(ratioSet.ratios, config);
  const scored = scorer.score({ ratios: ratioSet.ratios, growth });
  const narrative = generateNarrativeNotes(ratioSet.ratios, growth, config);

  const assessment: HealthAssessment = {
    ticker,
    fiscalYear,
    scorer: scored.scorer,
    categoryScores: scored.categoryScores,
    overallScore: scored.overallScore,
    status: scored.status,
    notes: narrative.map((n) => n.message),
  };

  return deepFreeze({ ticker, fiscalYear, ratioSet, growth, totals, healthScore, assessment, narrative });
}

function categoryScore(result: CompanyYearResult, category: HealthCategory): number | null {
  return result.assessment.categoryScores.find((c) => c.category === category)?.score ?? null;
}

/** The reporting scorer had no ratio to work with. */
export function isInsufficientData(result: CompanyYearResult): boolean {
  if (result.assessment.status === "Unknown") return true;
  return result.assessment.scorer === "point_accumulation" && result.healthScore.observedMetrics === 0;
}

export function toFlatHealthRecord(result: CompanyYearResult): FlatHealthRecord {
  return {
    ticker: result.ticker,
    fiscal_year: result.fiscalYear,
    ...result.ratioSet.ratios,
    revenue_growth: result.growth.revenue_growth,
    profit_growth: result.growth.profit_growth,
    liquidity_score: categoryScore(result, "liquidity"),
    profitability_score: categoryScore(result, "profitability"),
    leverage_score: categoryScore(result, "leverage"),
    cash_flow_score: categoryScore(result, "cash_flow"),
    growth_score: categoryScore(result, "growth"),
    overall_score: result.assessment.overallScore ?? null,
    overall_status: result.assessment.status,
    health_score: result.healthScore.overallScore,
    health_status: result.healthScore.status,
    analysis_notes: isInsufficientData(result) ? INSUFFICIENT_DATA_SUMMARY : summarizeNotes(result.narrative),
  };
}
