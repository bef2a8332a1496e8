/**
 * Ratio Calculator — Public API
 */

export type {
  DebtBasis,
  QuickRatioPolicy,
  RatioDiagnostics,
  RatioName,
  RatioPolicy,
  RatioResult,
  RatioSet,
  RatioValues,
} from "./types";
export { DEFAULT_RATIO_POLICY, QUICK_RATIO_POLICIES, RATIO_NAMES } from "./types";

export { explainDivide, finiteOrNull, safeDivide } from "./explain";
export { computeRatioSet, countObservedRatios, emptyRatioValues, mapRatios } from "./ratios";
export type { ComputeRatioSetInput } from "./ratios";
