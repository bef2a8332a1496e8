/**
 * Pipeline — Public API
 */

export type {
  CompanyRun,
  CompanyYearResult,
  FinancialStore,
  FlatHealthRecord,
  FlatTrendRecord,
  HealthPipelineRun,
  PipelineFailure,
  RunHealthPipelineOptions,
  ScoringOptions,
  StatementProvider,
  YearRankRecord,
} from "./types";

export type { HealthPipelineErrorCode } from "./errors";
export { HealthPipelineError, isHealthPipelineError, PersistenceError, ProviderUnavailableError } from "./errors";

export type { ScoreCompanyYearInput } from "./scoreCompanyYear";
export { isInsufficientData, scoreCompanyYear, toFlatHealthRecord } from "./scoreCompanyYear";
export { computeCompanyTrends, toFlatTrendRecord, TREND_METRICS } from "./trends";
export { DEFAULT_PIPELINE_CONCURRENCY, runHealthPipeline, toYearRankRecords } from "./runHealthPipeline";
