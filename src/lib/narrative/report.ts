/**
 * Narrative Reporter — plain-text rendering.
 *
 * Fixed-width report for one company-year, its multi-year trends, and the
 * cross-company ranking table printed by the pipeline CLI.
 */

import type { MetricTrend } from "@/lib/growth/types";
import { isHealthy } from "@/lib/healthScoring/status";
import type { CategoryScore, HealthAssessment, HealthStatus } from "@/lib/healthScoring/types";
import type { Ranked, RankableCompany } from "@/lib/ranking/rank";
import { formatPercent, INSUFFICIENT_DATA_SUMMARY } from "./notes";

const WIDTH = 70;
const RULE = "=".repeat(WIDTH);
const SUB_RULE = `  ${"-".repeat(40)}`;
const BAR_CELLS = 10;

const RECOMMENDATIONS: Record<HealthStatus, readonly string[]> = {
  Excellent: ["Excellent financial health.", "Solid fundamentals across all areas."],
  Good: ["Financially healthy.", "Some areas could be improved."],
  Fair: ["Moderate financial health.", "Some metrics require monitoring."],
  Concerning: ["Signs of financial stress.", "Deeper analysis recommended."],
  Poor: ["Critical financial situation.", "High risk - requires urgent attention."],
  Unknown: [INSUFFICIENT_DATA_SUMMARY],
};

export interface ReportOptions {
  companyName?: string;
}

/** floor(score / 10) filled cells out of 10. */
export function scoreBar(score: number | null): string {
  const filled = score === null ? 0 : Math.min(BAR_CELLS, Math.max(0, Math.floor(score / 10)));
  return "█".repeat(filled) + "░".repeat(BAR_CELLS - filled);
}

function categoryLine(c: CategoryScore): string {
  const value = c.score === null ? "n/a" : c.score.toFixed(1);
  return `  ${c.category.toUpperCase().padEnd(15)} [${scoreBar(c.score)}] ${value}`;
}

function indent(lines: readonly string[]): string[] {
  return lines.map((l) => `  ${l}`);
}

export function renderHealthReport(assessment: HealthAssessment, opts: ReportOptions = {}): string {
  const title = opts.companyName ? `${assessment.ticker} (${opts.companyName})` : assessment.ticker;
  const lines: string[] = [
    RULE,
    `  FINANCIAL HEALTH REPORT - ${title}`,
    `  Fiscal year: ${assessment.fiscalYear}`,
    RULE,
    "",
  ];

  if (assessment.overallScore === undefined || assessment.status === "Unknown") {
    lines.push(
      "  Overall score: insufficient data",
      `  Status: ${assessment.status}`,
      "",
      ...indent(RECOMMENDATIONS.Unknown),
      "",
      RULE,
    );
    return lines.join("\n");
  }

  lines.push(
    `  Overall score: ${assessment.overallScore}/100`,
    `  Status: ${assessment.status}`,
    "",
    "  Category scores:",
    SUB_RULE,
    ...assessment.categoryScores.map(categoryLine),
    "",
    "  Detailed analysis:",
    SUB_RULE,
    ...(assessment.notes.length > 0 ? indent(assessment.notes) : ["  No significant observations."]),
    "",
    "  Recommendation:",
    SUB_RULE,
    ...indent(RECOMMENDATIONS[assessment.status]),
    "",
    RULE,
  );
  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Trend table
// ---------------------------------------------------------------------------

function trendLine(t: MetricTrend): string {
  const first = t.points[0];
  const last = t.points[t.points.length - 1];
  const span = first && last ? `${first.fiscalYear}-${last.fiscalYear}` : "-";
  const cagr = t.cagr === null ? "n/a" : `${t.cagr >= 0 ? "+" : ""}${formatPercent(t.cagr)}`;
  return `  ${t.metric.toUpperCase().padEnd(20)}${span.padEnd(11)}${cagr.padStart(8)}  ${t.direction}`;
}

export function renderTrendTable(trends: readonly MetricTrend[]): string {
  return [
    `  ${"Trend".padEnd(20)}${"Years".padEnd(11)}${"CAGR".padStart(8)}  Direction`,
    SUB_RULE,
    ...trends.map(trendLine),
  ].join("\n");
}

// ---------------------------------------------------------------------------
// Ranking table
// ---------------------------------------------------------------------------

export interface RankingRow extends RankableCompany {
  status: HealthStatus;
  companyName?: string;
  fiscalYear?: number;
}

export function renderRankingTable(rows: readonly Ranked<RankingRow>[]): string {
  const lines: string[] = [
    RULE,
    "  HEALTH RANKING",
    RULE,
    `  ${"#".padEnd(4)}${"Ticker".padEnd(8)}${"Company".padEnd(24)}${"Year".padEnd(6)}${"Score".padStart(7)}  ${"Status".padEnd(11)}Healthy`,
    SUB_RULE,
  ];
  for (const row of rows) {
    const rank = row.rank === null ? "-" : String(row.rank);
    const year = row.fiscalYear === undefined ? "-" : String(row.fiscalYear);
    const name = row.companyName ?? "-";
    const score = row.score === undefined ? "n/a" : row.score.toFixed(1);
    const healthy = row.score === undefined ? "-" : isHealthy(row.score) ? "✅" : "❌";
    lines.push(
      `  ${rank.padEnd(4)}${row.ticker.padEnd(8)}${name.padEnd(24)}${year.padEnd(6)}${score.padStart(7)}  ${row.status.padEnd(11)}${healthy}`,
    );
  }
  lines.push(RULE);
  return lines.join("\n");
}
