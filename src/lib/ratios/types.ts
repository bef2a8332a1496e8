/**
 * Ratio Calculator — Shared Types
 *
 * Fixed-field ratio record per company-year. Every ratio is nullable; a null
 * ratio carries diagnostics explaining which input was missing or whether the
 * denominator was zero.
 */

// ---------------------------------------------------------------------------
// Ratio vocabulary
// ---------------------------------------------------------------------------

export interface RatioValues {
  current_ratio: number | null;
  quick_ratio: number | null;
  cash_ratio: number | null;
  gross_margin: number | null;
  operating_margin: number | null;
  net_margin: number | null;
  roe: number | null;
  roa: number | null;
  debt_to_equity: number | null;
  debt_to_assets: number | null;
  asset_turnover: number | null;
  operating_cash_flow_ratio: number | null;
  free_cash_flow_margin: number | null;
}

export type RatioName = keyof RatioValues;

export const RATIO_NAMES = [
  "current_ratio",
  "quick_ratio",
  "cash_ratio",
  "gross_margin",
  "operating_margin",
  "net_margin",
  "roe",
  "roa",
  "debt_to_equity",
  "debt_to_assets",
  "asset_turnover",
  "operating_cash_flow_ratio",
  "free_cash_flow_margin",
] as const satisfies readonly RatioName[];

// ---------------------------------------------------------------------------
// Policies
// ---------------------------------------------------------------------------

/**
 * quick_ratio numerator.
 *
 * - current_assets: current assets undiscounted (historical approximation)
 * - subtract_inventory: current assets less inventory when inventory is reported
 */
export const QUICK_RATIO_POLICIES = ["current_assets", "subtract_inventory"] as const;

export type QuickRatioPolicy = (typeof QUICK_RATIO_POLICIES)[number];

export interface RatioPolicy {
  quickRatio: QuickRatioPolicy;
}

export const DEFAULT_RATIO_POLICY: RatioPolicy = { quickRatio: "current_assets" };

/** Balance-sheet figure used as "debt" by debt_to_equity and debt_to_assets. */
export type DebtBasis = "total_debt" | "total_liabilities";

// ---------------------------------------------------------------------------
// Diagnostics
// ---------------------------------------------------------------------------

export interface RatioDiagnostics {
  formula: string;
  inputs: Record<string, number | null>;
  missingInputs?: string[];
  divideByZero?: boolean;
  /** Leverage ratios only */
  debtBasis?: DebtBasis;
  note?: string;
}

export interface RatioResult {
  value: number | null;
  diagnostics: RatioDiagnostics;
}

// ---------------------------------------------------------------------------
// Ratio set
// ---------------------------------------------------------------------------

export interface RatioSet {
  ticker: string;
  fiscalYear: number;
  ratios: RatioValues;
  diagnostics: Record<RatioName, RatioDiagnostics>;
}
