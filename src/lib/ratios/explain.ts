/**
 * Ratio Calculator — Safe arithmetic and explainability helpers.
 *
 * Every ratio goes through safeDivide. Null, undefined and non-finite operands
 * never coerce to 0; they propagate as null.
 */

import type { RatioDiagnostics, RatioResult } from "./types";

/** Finite number or null. NaN and ±Infinity count as missing. */
export function finiteOrNull(value: number | null | undefined): number | null {
  if (value === null || value === undefined || !Number.isFinite(value)) return null;
  return value;
}

/**
 * Null-safe division: null when either operand is missing/non-finite or the
 * denominator is zero. Never throws, never returns NaN or Infinity.
 */
export function safeDivide(
  numerator: number | null | undefined,
  denominator: number | null | undefined,
): number | null {
  const n = finiteOrNull(numerator);
  const d = finiteOrNull(denominator);
  if (n === null || d === null || d === 0) return null;
  return finiteOrNull(n / d);
}

/**
 * safeDivide with an audit trail: which input was missing, or whether the
 * denominator was zero.
 */
export function explainDivide(
  numeratorKey: string,
  numerator: number | null | undefined,
  denominatorKey: string,
  denominator: number | null | undefined,
  formula: string,
  extra: Partial<RatioDiagnostics> = {},
): RatioResult {
  const n = finiteOrNull(numerator);
  const d = finiteOrNull(denominator);
  const diagnostics: RatioDiagnostics = {
    formula,
    inputs: { [numeratorKey]: n, [denominatorKey]: d },
    ...extra,
  };

  const missingInputs: string[] = [];
  if (n === null) missingInputs.push(numeratorKey);
  if (d === null) missingInputs.push(denominatorKey);

  if (missingInputs.length > 0) {
    return { value: null, diagnostics: { ...diagnostics, missingInputs } };
  }

  if (d === 0) {
    return { value: null, diagnostics: { ...diagnostics, divideByZero: true } };
  }

  return { value: safeDivide(n, d), diagnostics };
}
