/**
 * Provider label alias table.
 *
 * Many-to-one map from provider line-item labels to the canonical vocabulary,
 * one table per statement kind. The table lives in labelAliases.json; within a
 * metric, labels are listed in priority order (used by the alias_priority
 * duplicate policy).
 *
 * NOTE: Keep deterministic + testable. Exact label matching only (after
 * whitespace/case folding), no fuzzy matching.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import {
  BALANCE_METRICS,
  CASH_FLOW_METRICS,
  INCOME_METRICS,
  type CanonicalMetric,
  type StatementKind,
} from "./types";

// ---------------------------------------------------------------------------
// Table schema
// ---------------------------------------------------------------------------

const LabelList = z.array(z.string().min(1)).min(1);

const AliasTableSchema = z.object({
  income: z.record(z.enum(INCOME_METRICS), LabelList),
  balance: z.record(z.enum(BALANCE_METRICS), LabelList),
  cash_flow: z.record(z.enum(CASH_FLOW_METRICS), LabelList),
});

export type AliasTable = z.infer<typeof AliasTableSchema>;

export interface AliasHit {
  metric: CanonicalMetric;
  /** Position of the label within its metric's list; lower wins */
  priority: number;
}

export type AliasIndex = Record<StatementKind, Map<string, AliasHit>>;

// ---------------------------------------------------------------------------
// Index construction
// ---------------------------------------------------------------------------

/** Fold a provider label to its lookup key: trimmed, single-spaced, lower-case. */
export function labelKey(label: string): string {
  return label.trim().replace(/\s+/g, " ").toLowerCase();
}

function indexStatement<M extends CanonicalMetric>(
  statement: StatementKind,
  metrics: readonly M[],
  table: Partial<Record<M, string[]>>,
): Map<string, AliasHit> {
  const index = new Map<string, AliasHit>();

  for (const metric of metrics) {
    const labels = table[metric] ?? [];
    labels.forEach((label, priority) => {
      const key = labelKey(label);
      const existing = index.get(key);
      if (existing) {
        throw new Error(
          `ALIAS_CONFLICT: "${label}" (${statement}) maps to both ${existing.metric} and ${metric}`,
        );
      }
      index.set(key, { metric, priority });
    });
  }

  return index;
}

export function buildAliasIndex(raw: unknown): AliasIndex {
  const table = AliasTableSchema.parse(raw);
  return {
    income: indexStatement("income", INCOME_METRICS, table.income),
    balance: indexStatement("balance", BALANCE_METRICS, table.balance),
    cash_flow: indexStatement("cash_flow", CASH_FLOW_METRICS, table.cash_flow),
  };
}

function loadDefaultAliasIndex(): AliasIndex {
  const source = readFileSync(new URL("./labelAliases.json", import.meta.url), "utf-8");
  return buildAliasIndex(JSON.parse(source));
}

export const DEFAULT_ALIAS_INDEX: AliasIndex = loadDefaultAliasIndex();
