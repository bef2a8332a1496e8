/**
 * Company universe — the tickers a default pipeline run covers.
 */

export interface Company {
  ticker: string;
  name: string;
}

export const DEFAULT_COMPANIES: readonly Company[] = Object.freeze([
  { ticker: "AAPL", name: "Apple Inc." },
  { ticker: "MSFT", name: "Microsoft Corporation" },
  { ticker: "GOOGL", name: "Alphabet Inc." },
  { ticker: "AMZN", name: "Amazon.com Inc." },
  { ticker: "NVDA", name: "NVIDIA Corporation" },
  { ticker: "META", name: "Meta Platforms Inc." },
  { ticker: "TSLA", name: "Tesla Inc." },
  { ticker: "AVGO", name: "Broadcom Inc." },
  { ticker: "ASML", name: "ASML Holding N.V." },
  { ticker: "NFLX", name: "Netflix Inc." },
]);

export function normalizeTicker(ticker: string): string {
  return ticker.trim().toUpperCase();
}

export function companyName(ticker: string): string | undefined {
  const key = normalizeTicker(ticker);
  return DEFAULT_COMPANIES.find((c) => c.ticker === key)?.name;
}
