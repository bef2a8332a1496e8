/**
 * Ratio Calculator — the 13 financial ratios for one company-year.
 *
 * Pure function — deterministic, no side effects.
 *
 * Policy choices carried explicitly in diagnostics:
 * - debt_to_equity / debt_to_assets: debt = total_debt, else total_liabilities
 *   (debtBasis records which). No other ratio uses the fallback.
 * - quick_ratio: see QuickRatioPolicy.
 */

import type { CanonicalMetricSlices } from "@/lib/metricNormalizer/types";
import { explainDivide, finiteOrNull } from "./explain";
import {
  DEFAULT_RATIO_POLICY,
  RATIO_NAMES,
  type DebtBasis,
  type RatioDiagnostics,
  type RatioName,
  type RatioPolicy,
  type RatioResult,
  type RatioSet,
  type RatioValues,
} from "./types";

type BalanceSlice = CanonicalMetricSlices["balance"];

// ---------------------------------------------------------------------------
// Policy helpers
// ---------------------------------------------------------------------------

function resolveDebt(balance: BalanceSlice): { value: number | null; basis?: DebtBasis } {
  const totalDebt = finiteOrNull(balance.total_debt);
  if (totalDebt !== null) return { value: totalDebt, basis: "total_debt" };

  const liabilities = finiteOrNull(balance.total_liabilities);
  if (liabilities !== null) return { value: liabilities, basis: "total_liabilities" };

  return { value: null };
}

function computeQuickRatio(balance: BalanceSlice, policy: RatioPolicy): RatioResult {
  const currentAssets = finiteOrNull(balance.current_assets);
  const currentLiabilities = balance.current_liabilities;

  if (policy.quickRatio === "current_assets") {
    return explainDivide(
      "current_assets", currentAssets,
      "current_liabilities", currentLiabilities,
      "CurrentAssets / CurrentLiabilities",
      { note: "inventory not subtracted" },
    );
  }

  const inventory = finiteOrNull(balance.inventory);
  if (inventory === null || currentAssets === null) {
    return explainDivide(
      "current_assets", currentAssets,
      "current_liabilities", currentLiabilities,
      "(CurrentAssets - Inventory) / CurrentLiabilities",
      { note: "inventory unavailable; current assets used" },
    );
  }

  const result = explainDivide(
    "quick_assets", currentAssets - inventory,
    "current_liabilities", currentLiabilities,
    "(CurrentAssets - Inventory) / CurrentLiabilities",
  );
  return {
    value: result.value,
    diagnostics: {
      ...result.diagnostics,
      inputs: { ...result.diagnostics.inputs, current_assets: currentAssets, inventory },
    },
  };
}

function computeLeverage(
  debt: { value: number | null; basis?: DebtBasis },
  denominatorKey: "total_equity" | "total_assets",
  denominator: number | null | undefined,
): RatioResult {
  const formula = denominatorKey === "total_equity" ? "Debt / TotalEquity" : "Debt / TotalAssets";
  const result = explainDivide("debt", debt.value, denominatorKey, denominator, formula);
  if (!debt.basis) return result;
  return { value: result.value, diagnostics: { ...result.diagnostics, debtBasis: debt.basis } };
}

// ---------------------------------------------------------------------------
// Main entry
// ---------------------------------------------------------------------------

export interface ComputeRatioSetInput {
  ticker: string;
  fiscalYear: number;
  slices: CanonicalMetricSlices;
  policy?: RatioPolicy;
}

export function computeRatioSet(input: ComputeRatioSetInput): RatioSet {
  const policy = input.policy ?? DEFAULT_RATIO_POLICY;
  const { income, balance, cashFlow } = input.slices;
  const debt = resolveDebt(balance);

  const results: Record<RatioName, RatioResult> = {
    current_ratio: explainDivide(
      "current_assets", balance.current_assets,
      "current_liabilities", balance.current_liabilities,
      "CurrentAssets / CurrentLiabilities",
    ),
    quick_ratio: computeQuickRatio(balance, policy),
    cash_ratio: explainDivide(
      "cash_and_equivalents", balance.cash_and_equivalents,
      "current_liabilities", balance.current_liabilities,
      "CashAndEquivalents / CurrentLiabilities",
    ),
    gross_margin: explainDivide("gross_profit", income.gross_profit, "revenue", income.revenue, "GrossProfit / Revenue"),
    operating_margin: explainDivide(
      "operating_income", income.operating_income,
      "revenue", income.revenue,
      "OperatingIncome / Revenue",
    ),
    net_margin: explainDivide("net_income", income.net_income, "revenue", income.revenue, "NetIncome / Revenue"),
    roe: explainDivide("net_income", income.net_income, "total_equity", balance.total_equity, "NetIncome / TotalEquity"),
    roa: explainDivide("net_income", income.net_income, "total_assets", balance.total_assets, "NetIncome / TotalAssets"),
    debt_to_equity: computeLeverage(debt, "total_equity", balance.total_equity),
    debt_to_assets: computeLeverage(debt, "total_assets", balance.total_assets),
    asset_turnover: explainDivide("revenue", income.revenue, "total_assets", balance.total_assets, "Revenue / TotalAssets"),
    operating_cash_flow_ratio: explainDivide(
      "operating_cash_flow", cashFlow.operating_cash_flow,
      "current_liabilities", balance.current_liabilities,
      "OperatingCashFlow / CurrentLiabilities",
    ),
    free_cash_flow_margin: explainDivide(
      "free_cash_flow", cashFlow.free_cash_flow,
      "revenue", income.revenue,
      "FreeCashFlow / Revenue",
    ),
  };

  return {
    ticker: input.ticker,
    fiscalYear: input.fiscalYear,
    ratios: mapRatios((name) => results[name].value),
    diagnostics: mapRatios((name): RatioDiagnostics => results[name].diagnostics),
  };
}

// ---------------------------------------------------------------------------
// Record helpers
// ---------------------------------------------------------------------------

/** Build a full per-ratio record from a function of the ratio name. */
export function mapRatios<T>(fn: (name: RatioName) => T): Record<RatioName, T> {
  return {
    current_ratio: fn("current_ratio"),
    quick_ratio: fn("quick_ratio"),
    cash_ratio: fn("cash_ratio"),
    gross_margin: fn("gross_margin"),
    operating_margin: fn("operating_margin"),
    net_margin: fn("net_margin"),
    roe: fn("roe"),
    roa: fn("roa"),
    debt_to_equity: fn("debt_to_equity"),
    debt_to_assets: fn("debt_to_assets"),
    asset_turnover: fn("asset_turnover"),
    operating_cash_flow_ratio: fn("operating_cash_flow_ratio"),
    free_cash_flow_margin: fn("free_cash_flow_margin"),
  };
}

export function emptyRatioValues(): RatioValues {
  return mapRatios(() => null);
}

/** Number of ratios with a usable (non-null) value. */
export function countObservedRatios(ratios: RatioValues): number {
  return RATIO_NAMES.filter((name) => ratios[name] !== null).length;
}
