/**
 * Postgres-backed FinancialStore.
 *
 * Each replace* call is a full refresh for the ticker: DELETE then INSERT in
 * one transaction. replaceYearRanks refreshes the whole table. Any driver
 * error surfaces as PersistenceError.
 */

import pg from "pg";
import type { Pool as PgPool, PoolClient } from "pg";
import type { YearTotals } from "@/lib/growth/types";
import type { CanonicalMetricRecord, CanonicalMetricSlices } from "@/lib/metricNormalizer/types";
import { PersistenceError } from "@/lib/pipeline/errors";
import type { FinancialStore, FlatHealthRecord, FlatTrendRecord, YearRankRecord } from "@/lib/pipeline/types";
import {
  buildInsert,
  CANONICAL_METRIC_COLUMNS,
  canonicalMetricValues,
  COMPANY_HEALTH_COLUMNS,
  COMPANY_TREND_COLUMNS,
  companyHealthValues,
  companyTrendValues,
  rowsToSlices,
  rowsToYearTotals,
  SCHEMA_SQL,
  YEAR_RANK_COLUMNS,
  yearRankValues,
  type CanonicalMetricRow,
  type InsertStatement,
} from "./sql";

const { Pool } = pg;

export interface PgFinancialStoreOptions {
  connectionString: string;
  max?: number;
}

export class PgFinancialStore implements FinancialStore {
  private readonly pool: PgPool;

  constructor(opts: PgFinancialStoreOptions) {
    this.pool = new Pool({ connectionString: opts.connectionString, max: opts.max ?? 4 });
  }

  private async run<T>(operation: string, details: Record<string, unknown>, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new PersistenceError(operation, err, details);
    }
  }

  private async inTransaction(fn: (client: PoolClient) => Promise<void>): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      await fn(client);
      await client.query("COMMIT");
    } catch (err) {
      await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
        console.error("[db] rollback failed", rollbackErr);
      });
      throw err;
    } finally {
      client.release();
    }
  }

  private async replace(
    operation: string,
    table: string,
    ticker: string,
    insert: InsertStatement | null,
  ): Promise<void> {
    await this.run(operation, { ticker }, () =>
      this.inTransaction(async (client) => {
        await client.query(`DELETE FROM ${table} WHERE ticker = $1`, [ticker]);
        if (insert) await client.query(insert.text, insert.values);
      }),
    );
  }

  async ensureSchema(): Promise<void> {
    await this.run("ensureSchema", {}, async () => {
      await this.pool.query(SCHEMA_SQL);
    });
  }

  async replaceCanonicalMetrics(ticker: string, records: readonly CanonicalMetricRecord[]): Promise<void> {
    const insert = buildInsert("canonical_metrics", CANONICAL_METRIC_COLUMNS, records.map(canonicalMetricValues));
    await this.replace("replaceCanonicalMetrics", "canonical_metrics", ticker, insert);
  }

  async loadCanonicalMetrics(ticker: string, fiscalYear: number): Promise<CanonicalMetricSlices> {
    return this.run("loadCanonicalMetrics", { ticker, fiscalYear }, async () => {
      const { rows } = await this.pool.query<CanonicalMetricRow>(
        `SELECT statement, metric, value
         FROM canonical_metrics
         WHERE ticker = $1 AND fiscal_year = $2`,
        [ticker, fiscalYear],
      );
      return rowsToSlices(rows);
    });
  }

  async loadPriorYearTotals(ticker: string, fiscalYear: number): Promise<YearTotals | null> {
    return this.run("loadPriorYearTotals", { ticker, fiscalYear }, async () => {
      const { rows } = await this.pool.query<CanonicalMetricRow>(
        `SELECT statement, metric, value
         FROM canonical_metrics
         WHERE ticker = $1 AND fiscal_year = $2`,
        [ticker, fiscalYear - 1],
      );
      return rowsToYearTotals(rows);
    });
  }

  async listFiscalYears(ticker: string): Promise<number[]> {
    return this.run("listFiscalYears", { ticker }, async () => {
      const { rows } = await this.pool.query<{ fiscal_year: number }>(
        `SELECT DISTINCT fiscal_year
         FROM canonical_metrics
         WHERE ticker = $1
         ORDER BY fiscal_year DESC`,
        [ticker],
      );
      return rows.map((r) => r.fiscal_year);
    });
  }

  async replaceCompanyResults(ticker: string, records: readonly FlatHealthRecord[]): Promise<void> {
    const insert = buildInsert("company_health", COMPANY_HEALTH_COLUMNS, records.map(companyHealthValues));
    await this.replace("replaceCompanyResults", "company_health", ticker, insert);
  }

  async replaceCompanyTrends(ticker: string, records: readonly FlatTrendRecord[]): Promise<void> {
    const insert = buildInsert("company_trends", COMPANY_TREND_COLUMNS, records.map(companyTrendValues));
    await this.replace("replaceCompanyTrends", "company_trends", ticker, insert);
  }

  async replaceYearRanks(records: readonly YearRankRecord[]): Promise<void> {
    const insert = buildInsert("company_year_ranks", YEAR_RANK_COLUMNS, records.map(yearRankValues));
    await this.run("replaceYearRanks", { rows: records.length }, () =>
      this.inTransaction(async (client) => {
        await client.query("DELETE FROM company_year_ranks");
        if (insert) await client.query(insert.text, insert.values);
      }),
    );
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
