/**
 * Pipeline — Run orchestration.
 *
 * fetch → normalize → persist canonical records → score the most recent
 * fiscal years (newest first) → persist results and trends → rank latest
 * years → persist per-year standings.
 *
 * Tickers run concurrently behind p-limit; years within a ticker run in
 * order. A HealthPipelineError aborts only its ticker and is reported under
 * `failures`; anything else is a bug and propagates. Per-year standings span
 * every ticker, so a failure storing them fails the run.
 */

import pLimit from "p-limit";
import { companyName, normalizeTicker } from "@/lib/companies/universe";
import { DEFAULT_TREND_WINDOW } from "@/lib/growth/growth";
import { normalizeStatements } from "@/lib/metricNormalizer/normalize";
import type { RankingRow } from "@/lib/narrative/report";
import { rankCompanies, summarizeRanking } from "@/lib/ranking/rank";
import { assignYearRanks } from "@/lib/ranking/yearRanks";
import { isHealthPipelineError } from "./errors";
import { scoreCompanyYear, toFlatHealthRecord } from "./scoreCompanyYear";
import { computeCompanyTrends, toFlatTrendRecord } from "./trends";
import type {
  CompanyRun,
  CompanyYearResult,
  HealthPipelineRun,
  PipelineFailure,
  RunHealthPipelineOptions,
  YearRankRecord,
} from "./types";

export const DEFAULT_PIPELINE_CONCURRENCY = 4;

const UNMAPPED_SAMPLE_SIZE = 5;

async function processTicker(ticker: string, opts: RunHealthPipelineOptions): Promise<CompanyRun> {
  const { provider, store } = opts;
  const window = opts.trendWindow ?? DEFAULT_TREND_WINDOW;

  const statements = await provider.fetchStatements(ticker);
  const normalized = normalizeStatements({ ticker, statements, policy: opts.duplicateLabelPolicy });

  if (normalized.unmapped.length > 0) {
    console.warn("[normalize] unmapped labels dropped", {
      ticker,
      count: normalized.unmapped.length,
      sample: normalized.unmapped.slice(0, UNMAPPED_SAMPLE_SIZE).map((u) => `${u.statement}:${u.label}`),
    });
  }

  await store.replaceCanonicalMetrics(ticker, normalized.records);

  const years = (await store.listFiscalYears(ticker)).slice(0, window);
  const results: CompanyYearResult[] = [];
  for (const fiscalYear of years) {
    const [slices, priorTotals] = await Promise.all([
      store.loadCanonicalMetrics(ticker, fiscalYear),
      store.loadPriorYearTotals(ticker, fiscalYear),
    ]);
    results.push(scoreCompanyYear({ ticker, fiscalYear, slices, priorTotals }, opts));
  }

  await store.replaceCompanyResults(ticker, results.map(toFlatHealthRecord));

  const trends = computeCompanyTrends(normalized.records, window);
  await store.replaceCompanyTrends(ticker, trends.map((t) => toFlatTrendRecord(ticker, t)));

  const latest = results[0];
  console.log("[pipeline] ticker scored", {
    ticker,
    years: years.length,
    latestYear: latest?.fiscalYear ?? null,
    latestScore: latest?.assessment.overallScore ?? null,
  });

  return {
    ticker,
    results,
    trends,
    unmappedLabels: normalized.unmapped.length,
    skippedRows: normalized.skippedRows,
  };
}

function latestRankingRow(company: CompanyRun): RankingRow {
  const latest = company.results[0];
  const name = companyName(company.ticker);
  if (!latest) return { ticker: company.ticker, companyName: name, score: undefined, status: "Unknown" };
  return {
    ticker: company.ticker,
    companyName: name,
    fiscalYear: latest.fiscalYear,
    score: latest.assessment.overallScore,
    status: latest.assessment.status,
  };
}

/**
 * Revenue, net income and health-score standings within each fiscal year,
 * over every scored company-year of the run. A year with no tracked ratio
 * ranks last on health.
 */
export function toYearRankRecords(companies: readonly CompanyRun[]): YearRankRecord[] {
  const inputs = companies.flatMap((c) =>
    c.results.map((r) => ({
      ticker: r.ticker,
      fiscalYear: r.fiscalYear,
      revenue: r.totals.revenue,
      netIncome: r.totals.netIncome,
      healthScore: r.healthScore.observedMetrics > 0 ? r.healthScore.overallScore : null,
    })),
  );

  return assignYearRanks(inputs)
    .map((r) => ({
      ticker: r.ticker,
      fiscal_year: r.fiscalYear,
      revenue_rank: r.revenueRank,
      profit_rank: r.profitRank,
      health_rank: r.healthRank,
    }))
    .sort((a, b) => b.fiscal_year - a.fiscal_year || (a.ticker < b.ticker ? -1 : a.ticker > b.ticker ? 1 : 0));
}

export async function runHealthPipeline(opts: RunHealthPipelineOptions): Promise<HealthPipelineRun> {
  const limit = pLimit(opts.concurrency ?? DEFAULT_PIPELINE_CONCURRENCY);
  const tickers = [...new Set(opts.tickers.map(normalizeTicker))];
  const failures: PipelineFailure[] = [];

  console.log("[pipeline] run started", { tickers: tickers.length, concurrency: opts.concurrency ?? DEFAULT_PIPELINE_CONCURRENCY });

  const settled = await Promise.all(
    tickers.map((ticker) =>
      limit(async (): Promise<CompanyRun | null> => {
        try {
          return await processTicker(ticker, opts);
        } catch (err) {
          if (!isHealthPipelineError(err)) throw err;
          console.error("[pipeline] ticker failed", { ticker, code: err.code, message: err.message });
          failures.push({ ticker, code: err.code, message: err.message });
          return null;
        }
      }),
    ),
  );

  const companies = settled.filter((c): c is CompanyRun => c !== null);
  const ranking = rankCompanies(companies.map(latestRankingRow));
  const summary = summarizeRanking(ranking);
  failures.sort((a, b) => (a.ticker < b.ticker ? -1 : a.ticker > b.ticker ? 1 : 0));

  const yearRanks = toYearRankRecords(companies);
  if (yearRanks.length > 0) await opts.store.replaceYearRanks(yearRanks);

  console.log("[pipeline] run finished", {
    scored: summary.scored,
    healthy: summary.healthyCount,
    failures: failures.length,
  });

  return { companies, failures, ranking, summary, yearRanks };
}
