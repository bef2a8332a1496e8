/**
 * Financial health pipeline
 *
 * Fetches statements, scores the most recent company-years, persists the
 * results, trends and per-year standings, and prints a report per company
 * plus the ranking table.
 *
 * Exit codes:
 *   0  — every ticker scored
 *   1  — bad arguments / environment, or at least one ticker failed
 *
 * Usage:
 *   npx tsx scripts/runHealthPipeline.ts
 *   npx tsx scripts/runHealthPipeline.ts ACME GLBX --input fixtures/statements.json
 *   npx tsx scripts/runHealthPipeline.ts --scorer point_accumulation --all-years
 *
 * Env vars (see src/lib/env/server.ts):
 *   DATABASE_URL         — Postgres; in-memory store when unset
 *   STATEMENTS_API_URL   — required unless --input is given
 *   STATEMENTS_API_KEY, PIPELINE_CONCURRENCY, HTTP_TIMEOUT_MS,
 *   DUPLICATE_LABEL_POLICY, QUICK_RATIO_POLICY
 */

import { companyName, DEFAULT_COMPANIES } from "@/lib/companies/universe";
import { InMemoryFinancialStore } from "@/lib/db/inMemoryFinancialStore";
import { PgFinancialStore } from "@/lib/db/pgFinancialStore";
import { requireStatementsApi, serverEnv } from "@/lib/env/server";
import { createScorer } from "@/lib/healthScoring/scorer";
import { renderHealthReport, renderRankingTable, renderTrendTable } from "@/lib/narrative/report";
import { parsePipelineArgs } from "@/lib/pipeline/cliArgs";
import { runHealthPipeline } from "@/lib/pipeline/runHealthPipeline";
import type { FinancialStore, StatementProvider } from "@/lib/pipeline/types";
import { FileStatementProvider } from "@/lib/providers/fileStatementProvider";
import { HttpStatementProvider } from "@/lib/providers/httpStatementProvider";

function printHelp(): void {
  console.log(`
Financial health pipeline
=========================
Scores the five most recent fiscal years of each ticker and ranks companies
on their latest year.

Usage:
  npx tsx scripts/runHealthPipeline.ts [TICKER ...] [options]

Options:
  --input FILE   Read statements from a JSON file keyed by ticker
  --scorer KIND  category_weighted (default) or point_accumulation
  --all-years    Print a report for every fiscal year, not just the latest
  --help         Show this help text
`);
}

async function main(): Promise<void> {
  const parsed = parsePipelineArgs(process.argv.slice(2));
  if (!parsed.ok) {
    console.error(`[runHealthPipeline] ${parsed.error}`);
    process.exitCode = 1;
    return;
  }
  const args = parsed.args;
  if (args.help) {
    printHelp();
    return;
  }

  const env = serverEnv();
  const tickers = args.tickers.length > 0 ? args.tickers : DEFAULT_COMPANIES.map((c) => c.ticker);

  const provider: StatementProvider = args.input
    ? new FileStatementProvider(args.input)
    : new HttpStatementProvider(requireStatementsApi(env));

  const pgStore = env.DATABASE_URL ? new PgFinancialStore({ connectionString: env.DATABASE_URL }) : null;
  const store: FinancialStore = pgStore ?? new InMemoryFinancialStore();
  if (!pgStore) console.warn("[runHealthPipeline] DATABASE_URL not set; results kept in memory only");

  try {
    await pgStore?.ensureSchema();

    const run = await runHealthPipeline({
      tickers,
      provider,
      store,
      concurrency: env.PIPELINE_CONCURRENCY,
      duplicateLabelPolicy: env.DUPLICATE_LABEL_POLICY,
      ratioPolicy: { quickRatio: env.QUICK_RATIO_POLICY },
      scorer: createScorer(args.scorer),
    });

    for (const company of run.companies) {
      const results = args.allYears ? company.results : company.results.slice(0, 1);
      for (const result of results) {
        console.log(renderHealthReport(result.assessment, { companyName: companyName(company.ticker) }));
        const ranks = run.yearRanks.find((r) => r.ticker === company.ticker && r.fiscal_year === result.fiscalYear);
        if (ranks) {
          console.log(
            `  Rank in ${result.fiscalYear}: revenue #${ranks.revenue_rank}, ` +
              `net income #${ranks.profit_rank}, health #${ranks.health_rank}`,
          );
        }
        console.log("");
      }
      console.log(renderTrendTable(company.trends));
      console.log("");
    }

    console.log(renderRankingTable(run.ranking));
    console.log(
      `\n${run.summary.healthyCount} of ${run.summary.scored} companies healthy` +
        (run.summary.averageScore !== undefined ? `, average score ${run.summary.averageScore}` : ""),
    );

    for (const failure of run.failures) {
      console.error(`❌ ${failure.ticker}: [${failure.code}] ${failure.message}`);
    }
    if (run.failures.length > 0) process.exitCode = 1;
  } finally {
    await pgStore?.close();
  }
}

main().catch((err: unknown) => {
  console.error("[runHealthPipeline] fatal:", err);
  process.exitCode = 1;
});
