/**
 * Pipeline — Collaborator interfaces and run results.
 */

import type { GrowthRates, MetricTrend, TrendDirection, YearTotals } from "@/lib/growth/types";
import type {
  HealthAssessment,
  HealthStatus,
  PointAccumulationResult,
  Scorer,
  ScoringConfig,
} from "@/lib/healthScoring/types";
import type {
  CanonicalMetricRecord,
  CanonicalMetricSlices,
  DuplicateLabelPolicy,
  RawStatements,
} from "@/lib/metricNormalizer/types";
import type { NarrativeNote } from "@/lib/narrative/notes";
import type { RankingRow } from "@/lib/narrative/report";
import type { Ranked, RankingSummary } from "@/lib/ranking/rank";
import type { RatioPolicy, RatioSet, RatioValues } from "@/lib/ratios/types";
import type { HealthPipelineErrorCode } from "./errors";

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export interface StatementProvider {
  /** Raw rows for every fiscal year the provider has. Throws ProviderUnavailableError. */
  fetchStatements(ticker: string): Promise<RawStatements>;
}

/** Storage boundary. Every method throws PersistenceError on failure. */
export interface FinancialStore {
  /** Full refresh of a ticker's canonical records. */
  replaceCanonicalMetrics(ticker: string, records: readonly CanonicalMetricRecord[]): Promise<void>;
  loadCanonicalMetrics(ticker: string, fiscalYear: number): Promise<CanonicalMetricSlices>;
  /** Revenue and net income of fiscalYear - 1, or null when that year is absent. */
  loadPriorYearTotals(ticker: string, fiscalYear: number): Promise<YearTotals | null>;
  /** Most recent first. */
  listFiscalYears(ticker: string): Promise<number[]>;
  /** Full refresh of a ticker's scored company-years. */
  replaceCompanyResults(ticker: string, records: readonly FlatHealthRecord[]): Promise<void>;
  /** Full refresh of a ticker's multi-year trends. */
  replaceCompanyTrends(ticker: string, records: readonly FlatTrendRecord[]): Promise<void>;
  /** Full refresh of the per-year standings across every ticker of the run. */
  replaceYearRanks(records: readonly YearRankRecord[]): Promise<void>;
}

// ---------------------------------------------------------------------------
// Scoring output
// ---------------------------------------------------------------------------

export interface ScoringOptions {
  /** Scorer behind the assessment; category-weighted by default */
  scorer?: Scorer;
  config?: ScoringConfig;
  ratioPolicy?: RatioPolicy;
}

export interface CompanyYearResult {
  readonly ticker: string;
  readonly fiscalYear: number;
  readonly ratioSet: RatioSet;
  readonly growth: GrowthRates;
  /** This year's revenue and net income */
  readonly totals: YearTotals;
  /** Point-accumulation score persisted as health_score */
  readonly healthScore: PointAccumulationResult;
  readonly assessment: HealthAssessment;
  readonly narrative: readonly NarrativeNote[];
}

/** One persisted row per (ticker, fiscal year). */
export interface FlatHealthRecord extends RatioValues {
  ticker: string;
  fiscal_year: number;
  revenue_growth: number | null;
  profit_growth: number | null;
  liquidity_score: number | null;
  profitability_score: number | null;
  leverage_score: number | null;
  cash_flow_score: number | null;
  growth_score: number | null;
  overall_score: number | null;
  overall_status: HealthStatus;
  health_score: number;
  health_status: HealthStatus;
  analysis_notes: string;
}

/** One persisted row per (ticker, trend metric). */
export interface FlatTrendRecord {
  ticker: string;
  metric: string;
  start_year: number | null;
  end_year: number | null;
  start_value: number | null;
  end_value: number | null;
  cagr: number | null;
  direction: TrendDirection;
}

/** One persisted row per scored (ticker, fiscal year). */
export interface YearRankRecord {
  ticker: string;
  fiscal_year: number;
  revenue_rank: number;
  profit_rank: number;
  health_rank: number;
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

export interface RunHealthPipelineOptions extends ScoringOptions {
  tickers: readonly string[];
  provider: StatementProvider;
  store: FinancialStore;
  concurrency?: number;
  duplicateLabelPolicy?: DuplicateLabelPolicy;
  /** Most recent fiscal years scored per ticker, also the trend window */
  trendWindow?: number;
}

export interface CompanyRun {
  ticker: string;
  /** Most recent fiscal year first */
  results: CompanyYearResult[];
  trends: MetricTrend[];
  unmappedLabels: number;
  skippedRows: number;
}

export interface PipelineFailure {
  ticker: string;
  code: HealthPipelineErrorCode;
  message: string;
}

export interface HealthPipelineRun {
  companies: CompanyRun[];
  failures: PipelineFailure[];
  /** Latest fiscal year of each company, best first */
  ranking: Ranked<RankingRow>[];
  summary: RankingSummary;
  /** Every scored company-year, latest fiscal year first, then by ticker */
  yearRanks: YearRankRecord[];
}
