/**
 * Metric Normalizer — Shared Types
 *
 * Canonical metric vocabulary per statement kind, raw provider rows, and the
 * records the normalizer produces.
 */

// ---------------------------------------------------------------------------
// Statement kinds
// ---------------------------------------------------------------------------

export const STATEMENT_KINDS = ["income", "balance", "cash_flow"] as const;

export type StatementKind = (typeof STATEMENT_KINDS)[number];

// ---------------------------------------------------------------------------
// Canonical vocabulary
// ---------------------------------------------------------------------------

export const INCOME_METRICS = [
  "revenue",
  "cost_of_revenue",
  "gross_profit",
  "operating_expenses",
  "operating_income",
  "net_income",
  "ebitda",
  "eps_basic",
  "eps_diluted",
] as const;

export const BALANCE_METRICS = [
  "total_assets",
  "total_liabilities",
  "total_equity",
  "current_assets",
  "current_liabilities",
  "cash_and_equivalents",
  "inventory",
  "total_debt",
  "retained_earnings",
] as const;

export const CASH_FLOW_METRICS = [
  "operating_cash_flow",
  "investing_cash_flow",
  "financing_cash_flow",
  "free_cash_flow",
  "capital_expenditures",
  "dividends_paid",
  "net_change_in_cash",
] as const;

export type IncomeMetric = (typeof INCOME_METRICS)[number];
export type BalanceMetric = (typeof BALANCE_METRICS)[number];
export type CashFlowMetric = (typeof CASH_FLOW_METRICS)[number];
export type CanonicalMetric = IncomeMetric | BalanceMetric | CashFlowMetric;

/** Returned by mapLabel when a provider label is not in the alias table. */
export const UNMAPPED = "unmapped";

export type MapLabelResult = CanonicalMetric | typeof UNMAPPED;

// ---------------------------------------------------------------------------
// Raw provider rows
// ---------------------------------------------------------------------------

export interface RawStatementRow {
  label: string;
  value: number | null;
  fiscalYear: number;
}

export interface RawStatements {
  income: RawStatementRow[];
  balance: RawStatementRow[];
  cashFlow: RawStatementRow[];
}

// ---------------------------------------------------------------------------
// Normalized output
// ---------------------------------------------------------------------------

/**
 * How two raw labels resolving to the same canonical metric within one
 * (ticker, fiscal year) are reconciled.
 *
 * - alias_priority: the label listed earlier in the alias table wins,
 *   regardless of provider row order
 * - first_write_wins: the first row in provider order wins
 * - last_write_wins: each later row overwrites the previous one
 */
export const DUPLICATE_LABEL_POLICIES = [
  "alias_priority",
  "first_write_wins",
  "last_write_wins",
] as const;

export type DuplicateLabelPolicy = (typeof DUPLICATE_LABEL_POLICIES)[number];

export const DEFAULT_DUPLICATE_LABEL_POLICY: DuplicateLabelPolicy = "alias_priority";

export interface CanonicalMetricRecord {
  readonly ticker: string;
  readonly fiscalYear: number;
  readonly statement: StatementKind;
  readonly metric: CanonicalMetric;
  readonly value: number | null;
  /** Provider label the value was taken from */
  readonly sourceLabel: string;
}

export interface UnmappedLabel {
  statement: StatementKind;
  label: string;
  fiscalYear: number;
}

export interface NormalizationResult {
  records: CanonicalMetricRecord[];
  unmapped: UnmappedLabel[];
  /** Rows skipped for a null/non-finite value or a malformed fiscal year */
  skippedRows: number;
}

export interface CanonicalMetricSlices {
  income: Partial<Record<IncomeMetric, number | null>>;
  balance: Partial<Record<BalanceMetric, number | null>>;
  cashFlow: Partial<Record<CashFlowMetric, number | null>>;
}
