/**
 * Ranking — per-year standings.
 *
 * Within each fiscal year, companies are ranked on revenue, net income and
 * health score with competition ranking (ties share a rank, the next rank
 * skips). Missing values rank after every present value.
 */

export interface YearRankInput {
  ticker: string;
  fiscalYear: number;
  revenue: number | null;
  netIncome: number | null;
  healthScore: number | null;
}

export interface YearRanks {
  revenueRank: number;
  profitRank: number;
  healthRank: number;
}

function present(v: number | null): v is number {
  return v !== null && Number.isFinite(v);
}

/** 1 + number of values strictly better; missing values share the slot after all present ones. */
function competitionRank(value: number | null, peers: readonly (number | null)[]): number {
  const observed = peers.filter(present);
  if (!present(value)) return observed.length + 1;
  return 1 + observed.filter((p) => p > value).length;
}

export function assignYearRanks<T extends YearRankInput>(rows: readonly T[]): Array<T & YearRanks> {
  const byYear = new Map<number, T[]>();
  for (const row of rows) {
    const bucket = byYear.get(row.fiscalYear);
    if (bucket) bucket.push(row);
    else byYear.set(row.fiscalYear, [row]);
  }

  return rows.map((row) => {
    const peers = byYear.get(row.fiscalYear) ?? [row];
    return {
      ...row,
      revenueRank: competitionRank(row.revenue, peers.map((p) => p.revenue)),
      profitRank: competitionRank(row.netIncome, peers.map((p) => p.netIncome)),
      healthRank: competitionRank(row.healthScore, peers.map((p) => p.healthScore)),
    };
  });
}
