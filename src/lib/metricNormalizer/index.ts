/**
 * Metric Normalizer — Public API
 */

export type {
  BalanceMetric,
  CanonicalMetric,
  CanonicalMetricRecord,
  CanonicalMetricSlices,
  CashFlowMetric,
  DuplicateLabelPolicy,
  IncomeMetric,
  MapLabelResult,
  NormalizationResult,
  RawStatementRow,
  RawStatements,
  StatementKind,
  UnmappedLabel,
} from "./types";

export {
  BALANCE_METRICS,
  CASH_FLOW_METRICS,
  DEFAULT_DUPLICATE_LABEL_POLICY,
  DUPLICATE_LABEL_POLICIES,
  INCOME_METRICS,
  STATEMENT_KINDS,
  UNMAPPED,
} from "./types";

export type { AliasHit, AliasIndex, AliasTable } from "./aliases";
export { buildAliasIndex, DEFAULT_ALIAS_INDEX, labelKey } from "./aliases";

export {
  emptySlices,
  isBalanceMetric,
  isCashFlowMetric,
  isIncomeMetric,
  listFiscalYears,
  mapLabel,
  normalizeStatements,
  toMetricSlices,
} from "./normalize";
export type { NormalizeStatementsInput } from "./normalize";
