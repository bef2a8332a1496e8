/**
 * In-process FinancialStore for tests and dry runs (no DATABASE_URL).
 */

import type { YearTotals } from "@/lib/growth/types";
import { listFiscalYears, toMetricSlices } from "@/lib/metricNormalizer/normalize";
import type { CanonicalMetricRecord, CanonicalMetricSlices } from "@/lib/metricNormalizer/types";
import type { FinancialStore, FlatHealthRecord, FlatTrendRecord, YearRankRecord } from "@/lib/pipeline/types";

export class InMemoryFinancialStore implements FinancialStore {
  private readonly metrics = new Map<string, CanonicalMetricRecord[]>();
  private readonly results = new Map<string, FlatHealthRecord[]>();
  private readonly trends = new Map<string, FlatTrendRecord[]>();
  private ranks: YearRankRecord[] = [];

  async replaceCanonicalMetrics(ticker: string, records: readonly CanonicalMetricRecord[]): Promise<void> {
    this.metrics.set(ticker, [...records]);
  }

  async loadCanonicalMetrics(ticker: string, fiscalYear: number): Promise<CanonicalMetricSlices> {
    return toMetricSlices(this.metrics.get(ticker) ?? [], fiscalYear);
  }

  async loadPriorYearTotals(ticker: string, fiscalYear: number): Promise<YearTotals | null> {
    const prior = (this.metrics.get(ticker) ?? []).filter((r) => r.fiscalYear === fiscalYear - 1);
    if (prior.length === 0) return null;
    return {
      revenue: prior.find((r) => r.metric === "revenue")?.value ?? null,
      netIncome: prior.find((r) => r.metric === "net_income")?.value ?? null,
    };
  }

  async listFiscalYears(ticker: string): Promise<number[]> {
    return listFiscalYears(this.metrics.get(ticker) ?? []);
  }

  async replaceCompanyResults(ticker: string, records: readonly FlatHealthRecord[]): Promise<void> {
    this.results.set(ticker, [...records]);
  }

  async replaceCompanyTrends(ticker: string, records: readonly FlatTrendRecord[]): Promise<void> {
    this.trends.set(ticker, [...records]);
  }

  async replaceYearRanks(records: readonly YearRankRecord[]): Promise<void> {
    this.ranks = [...records];
  }

  /** Persisted results, most recent fiscal year first. */
  companyResults(ticker: string): FlatHealthRecord[] {
    return [...(this.results.get(ticker) ?? [])].sort((a, b) => b.fiscal_year - a.fiscal_year);
  }

  canonicalMetrics(ticker: string): CanonicalMetricRecord[] {
    return [...(this.metrics.get(ticker) ?? [])];
  }

  companyTrends(ticker: string): FlatTrendRecord[] {
    return [...(this.trends.get(ticker) ?? [])];
  }

  yearRanks(): YearRankRecord[] {
    return [...this.ranks];
  }
}
