/**
 * StatementProvider backed by a local JSON file keyed by ticker.
 * Used by the CLI for offline runs.
 */

import { readFile } from "node:fs/promises";
import type { RawStatements } from "@/lib/metricNormalizer/types";
import { ProviderUnavailableError } from "@/lib/pipeline/errors";
import type { StatementProvider } from "@/lib/pipeline/types";
import { describeIssues, StatementsFileSchema, toRawStatements, type StatementsPayload } from "./payload";

export class FileStatementProvider implements StatementProvider {
  private loaded: Promise<Map<string, StatementsPayload>> | null = null;

  constructor(private readonly path: string) {}

  private async load(): Promise<Map<string, StatementsPayload>> {
    const text = await readFile(this.path, "utf8");
    const parsed = StatementsFileSchema.safeParse(JSON.parse(text));
    if (!parsed.success) {
      throw new Error(`Invalid statements file ${this.path}: ${describeIssues(parsed.error)}`);
    }
    return new Map(Object.entries(parsed.data).map(([ticker, payload]) => [ticker.trim().toUpperCase(), payload]));
  }

  async fetchStatements(ticker: string): Promise<RawStatements> {
    this.loaded ??= this.load();

    let byTicker: Map<string, StatementsPayload>;
    try {
      byTicker = await this.loaded;
    } catch (err) {
      const msg = err instanceof Error ? err.message : "unknown";
      throw new ProviderUnavailableError(ticker, msg, { cause: err });
    }

    const payload = byTicker.get(ticker.trim().toUpperCase());
    if (!payload) throw new ProviderUnavailableError(ticker, `no statements in ${this.path}`);
    return toRawStatements(payload);
  }
}
