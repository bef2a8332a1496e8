/**
 * Metric Normalizer — label mapping and record accumulation.
 *
 * Unmapped labels are not an error: partial or unknown provider schemas are
 * tolerated. They are returned in `unmapped` so the caller can count/log them.
 */

import { DEFAULT_ALIAS_INDEX, labelKey, type AliasHit, type AliasIndex } from "./aliases";
import {
  BALANCE_METRICS,
  CASH_FLOW_METRICS,
  DEFAULT_DUPLICATE_LABEL_POLICY,
  INCOME_METRICS,
  UNMAPPED,
  type BalanceMetric,
  type CanonicalMetricRecord,
  type CanonicalMetricSlices,
  type CashFlowMetric,
  type DuplicateLabelPolicy,
  type IncomeMetric,
  type MapLabelResult,
  type NormalizationResult,
  type RawStatementRow,
  type RawStatements,
  type StatementKind,
  type UnmappedLabel,
} from "./types";

// ---------------------------------------------------------------------------
// Label mapping
// ---------------------------------------------------------------------------

/**
 * Map a raw provider label to its canonical metric for a statement kind.
 * Pure; returns "unmapped" for unknown labels.
 */
export function mapLabel(
  label: string,
  statement: StatementKind,
  index: AliasIndex = DEFAULT_ALIAS_INDEX,
): MapLabelResult {
  return index[statement].get(labelKey(label))?.metric ?? UNMAPPED;
}

// ---------------------------------------------------------------------------
// Vocabulary guards
// ---------------------------------------------------------------------------

const INCOME_SET: ReadonlySet<string> = new Set(INCOME_METRICS);
const BALANCE_SET: ReadonlySet<string> = new Set(BALANCE_METRICS);
const CASH_FLOW_SET: ReadonlySet<string> = new Set(CASH_FLOW_METRICS);

export function isIncomeMetric(metric: string): metric is IncomeMetric {
  return INCOME_SET.has(metric);
}

export function isBalanceMetric(metric: string): metric is BalanceMetric {
  return BALANCE_SET.has(metric);
}

export function isCashFlowMetric(metric: string): metric is CashFlowMetric {
  return CASH_FLOW_SET.has(metric);
}

// ---------------------------------------------------------------------------
// Accumulation
// ---------------------------------------------------------------------------

interface Accepted {
  record: CanonicalMetricRecord;
  priority: number;
}

function shouldReplace(policy: DuplicateLabelPolicy, existing: Accepted, incoming: AliasHit): boolean {
  switch (policy) {
    case "first_write_wins":
      return false;
    case "last_write_wins":
      return true;
    case "alias_priority":
      // Same label repeated: the later row is a restatement and replaces it.
      return incoming.priority <= existing.priority;
  }
}

function statementRows(statements: RawStatements): Array<[StatementKind, RawStatementRow[]]> {
  return [
    ["income", statements.income],
    ["balance", statements.balance],
    ["cash_flow", statements.cashFlow],
  ];
}

export interface NormalizeStatementsInput {
  ticker: string;
  statements: RawStatements;
  policy?: DuplicateLabelPolicy;
  aliasIndex?: AliasIndex;
}

/**
 * Normalize one provider response into canonical metric records, one per
 * (ticker, fiscal year, metric). Null and non-finite values never produce or
 * overwrite a record.
 */
export function normalizeStatements(input: NormalizeStatementsInput): NormalizationResult {
  const ticker = input.ticker.trim().toUpperCase();
  const policy = input.policy ?? DEFAULT_DUPLICATE_LABEL_POLICY;
  const index = input.aliasIndex ?? DEFAULT_ALIAS_INDEX;

  const accepted = new Map<string, Accepted>();
  const unmapped: UnmappedLabel[] = [];
  let skippedRows = 0;

  for (const [statement, rows] of statementRows(input.statements)) {
    for (const row of rows) {
      const hit = index[statement].get(labelKey(row.label));
      if (!hit) {
        unmapped.push({ statement, label: row.label, fiscalYear: row.fiscalYear });
        continue;
      }

      if (!Number.isInteger(row.fiscalYear) || row.value === null || !Number.isFinite(row.value)) {
        skippedRows += 1;
        continue;
      }

      const key = `${row.fiscalYear}:${hit.metric}`;
      const existing = accepted.get(key);
      if (existing && !shouldReplace(policy, existing, hit)) continue;

      accepted.set(key, {
        priority: hit.priority,
        record: Object.freeze({
          ticker,
          fiscalYear: row.fiscalYear,
          statement,
          metric: hit.metric,
          value: row.value,
          sourceLabel: row.label,
        }),
      });
    }
  }

  return {
    records: [...accepted.values()].map((a) => a.record),
    unmapped,
    skippedRows,
  };
}

// ---------------------------------------------------------------------------
// Slicing
// ---------------------------------------------------------------------------

export function emptySlices(): CanonicalMetricSlices {
  return { income: {}, balance: {}, cashFlow: {} };
}

/**
 * Group records for one fiscal year into the income / balance / cash-flow
 * slices consumed by the ratio calculator.
 */
export function toMetricSlices(
  records: readonly CanonicalMetricRecord[],
  fiscalYear: number,
): CanonicalMetricSlices {
  const slices = emptySlices();

  for (const record of records) {
    if (record.fiscalYear !== fiscalYear) continue;
    const { metric, value } = record;
    if (isIncomeMetric(metric)) slices.income[metric] = value;
    else if (isBalanceMetric(metric)) slices.balance[metric] = value;
    else if (isCashFlowMetric(metric)) slices.cashFlow[metric] = value;
  }

  return slices;
}

/** Distinct fiscal years present in the records, most recent first. */
export function listFiscalYears(records: readonly CanonicalMetricRecord[]): number[] {
  return [...new Set(records.map((r) => r.fiscalYear))].sort((a, b) => b - a);
}
