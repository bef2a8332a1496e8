/**
 * Narrative Reporter — threshold-triggered observations.
 *
 * Each rule independently contributes zero or one note; no note suppresses
 * another. Rules run in category order: liquidity, profitability, leverage,
 * cash flow, growth. Advisory text only.
 */

import { growthBandIndex } from "@/lib/growth/growth";
import type { GrowthRates } from "@/lib/growth/types";
import { scoreMetric } from "@/lib/healthScoring/bands";
import { DEFAULT_SCORING_CONFIG } from "@/lib/healthScoring/config";
import type { HealthCategory, ScoringConfig } from "@/lib/healthScoring/types";
import { finiteOrNull } from "@/lib/ratios/explain";
import type { RatioName, RatioValues } from "@/lib/ratios/types";

export type NoteTone = "alert" | "warning" | "info" | "positive";

export interface NarrativeNote {
  category: HealthCategory;
  tone: NoteTone;
  message: string;
}

interface NoteContext {
  ratios: RatioValues;
  growth: GrowthRates | null | undefined;
  config: ScoringConfig;
}

type NoteRule = (ctx: NoteContext) => NarrativeNote | null;

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

export function formatRatio(value: number): string {
  return value.toFixed(2);
}

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

function note(category: HealthCategory, tone: NoteTone, message: string): NarrativeNote {
  return { category, tone, message };
}

function ratio(ctx: NoteContext, name: RatioName): number | null {
  return finiteOrNull(ctx.ratios[name]);
}

// ---------------------------------------------------------------------------
// Liquidity
// ---------------------------------------------------------------------------

const currentRatioRule: NoteRule = (ctx) => {
  const cr = ratio(ctx, "current_ratio");
  if (cr === null) return null;
  if (cr < 1.0) return note("liquidity", "alert", `Current ratio (${formatRatio(cr)}) below 1.0 - possible liquidity problems`);
  if (cr > 3.0) return note("liquidity", "info", `Current ratio (${formatRatio(cr)}) very high - possible idle capital`);
  return note("liquidity", "positive", `Current ratio (${formatRatio(cr)}) healthy`);
};

const cashRatioRule: NoteRule = (ctx) => {
  const cash = ratio(ctx, "cash_ratio");
  if (cash === null || cash >= 0.1) return null;
  return note("liquidity", "warning", `Cash ratio (${formatRatio(cash)}) low - limited cash reserves`);
};

// ---------------------------------------------------------------------------
// Profitability
// ---------------------------------------------------------------------------

const PROFITABILITY_LABELS = {
  gross_margin: "Gross margin",
  operating_margin: "Operating margin",
  net_margin: "Net margin",
  roe: "Return on equity",
  roa: "Return on assets",
} as const satisfies Partial<Record<RatioName, string>>;

function profitabilityRule(name: keyof typeof PROFITABILITY_LABELS): NoteRule {
  return (ctx) => {
    const value = ratio(ctx, name);
    if (value === null) return null;

    const label = PROFITABILITY_LABELS[name];
    if (value < 0) return note("profitability", "alert", `${label}: ${formatPercent(value)} - negative`);

    const score = scoreMetric(name, value, ctx.config);
    if (score === null) return null;
    if (score >= ctx.config.bandScores.good) {
      return note("profitability", "positive", `${label}: ${formatPercent(value)} - strong`);
    }
    if (score <= ctx.config.bandScores.poor) {
      return note("profitability", "warning", `${label}: ${formatPercent(value)} - below target`);
    }
    return null;
  };
}

// ---------------------------------------------------------------------------
// Leverage
// ---------------------------------------------------------------------------

const debtToEquityRule: NoteRule = (ctx) => {
  const de = ratio(ctx, "debt_to_equity");
  if (de === null) return null;
  if (de > 2.0) return note("leverage", "alert", `Debt-to-equity (${formatRatio(de)}) very high - heavily leveraged`);
  if (de < 0.5) return note("leverage", "positive", `Debt-to-equity (${formatRatio(de)}) conservative - low leverage`);
  return note("leverage", "info", `Debt-to-equity (${formatRatio(de)}) within acceptable levels`);
};

const debtToAssetsRule: NoteRule = (ctx) => {
  const da = ratio(ctx, "debt_to_assets");
  if (da === null || da <= 0.6) return null;
  return note(
    "leverage",
    "warning",
    `Debt-to-assets (${formatRatio(da)}) elevated - over 60% of assets financed by debt`,
  );
};

// ---------------------------------------------------------------------------
// Cash flow
// ---------------------------------------------------------------------------

const operatingCashFlowRule: NoteRule = (ctx) => {
  const ocf = ratio(ctx, "operating_cash_flow_ratio");
  if (ocf === null) return null;
  if (ocf < 0.3) return note("cash_flow", "warning", `Operating cash flow ratio (${formatRatio(ocf)}) low`);
  if (ocf >= 1.0) {
    return note(
      "cash_flow",
      "positive",
      `Operating cash flow ratio (${formatRatio(ocf)}) excellent - strong cash generation`,
    );
  }
  return null;
};

const freeCashFlowRule: NoteRule = (ctx) => {
  const fcf = ratio(ctx, "free_cash_flow_margin");
  if (fcf === null) return null;
  if (fcf < 0) {
    return note("cash_flow", "alert", `Free cash flow margin (${formatPercent(fcf)}) negative - company is burning cash`);
  }
  if (fcf >= 0.15) return note("cash_flow", "positive", `Free cash flow margin (${formatPercent(fcf)}) strong`);
  return null;
};

// ---------------------------------------------------------------------------
// Growth
// ---------------------------------------------------------------------------

const revenueGrowthRule: NoteRule = (ctx) => {
  const g = finiteOrNull(ctx.growth?.revenue_growth);
  if (g === null) return null;
  switch (growthBandIndex(g, ctx.config.growth.revenueBands)) {
    case 0:
      return note("growth", "positive", `Revenue growth: +${formatPercent(g)} - excellent`);
    case 1:
      return note("growth", "positive", `Revenue growth: +${formatPercent(g)} - good`);
    case 2:
      return note("growth", "info", `Revenue growth: +${formatPercent(g)} - moderate`);
    default:
      return note("growth", "warning", `Revenue declining: ${formatPercent(g)}`);
  }
};

const profitGrowthRule: NoteRule = (ctx) => {
  const g = finiteOrNull(ctx.growth?.profit_growth);
  if (g === null) return null;
  const bands = ctx.config.growth.profitBands;
  const band = growthBandIndex(g, bands);
  if (band === 0) return note("growth", "positive", `Profit growth: +${formatPercent(g)}`);
  if (band === bands.length) return note("growth", "warning", `Profit declining: ${formatPercent(g)}`);
  return null;
};

// ---------------------------------------------------------------------------
// Rule order
// ---------------------------------------------------------------------------

export const NOTE_RULES: readonly NoteRule[] = [
  currentRatioRule,
  cashRatioRule,
  profitabilityRule("gross_margin"),
  profitabilityRule("operating_margin"),
  profitabilityRule("net_margin"),
  profitabilityRule("roe"),
  profitabilityRule("roa"),
  debtToEquityRule,
  debtToAssetsRule,
  operatingCashFlowRule,
  freeCashFlowRule,
  revenueGrowthRule,
  profitGrowthRule,
];

export function generateNarrativeNotes(
  ratios: RatioValues,
  growth?: GrowthRates | null,
  config: ScoringConfig = DEFAULT_SCORING_CONFIG,
): NarrativeNote[] {
  const ctx: NoteContext = { ratios, growth, config };
  const notes: NarrativeNote[] = [];
  for (const rule of NOTE_RULES) {
    const n = rule(ctx);
    if (n) notes.push(n);
  }
  return notes;
}

export const NO_CONCERNS_SUMMARY = "No significant concerns identified.";
export const INSUFFICIENT_DATA_SUMMARY = "Insufficient data to assess financial health.";

/** Single-line form persisted alongside the health score. */
export function summarizeNotes(notes: readonly NarrativeNote[]): string {
  return notes.length > 0 ? notes.map((n) => n.message).join("; ") : NO_CONCERNS_SUMMARY;
}
