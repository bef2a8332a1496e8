/**
 * StatementProvider over HTTP.
 *
 * GET {baseUrl}/statements/{ticker} → StatementsPayload JSON. Network errors,
 * timeouts, non-2xx responses and payloads that fail validation all raise
 * ProviderUnavailableError for that ticker.
 */

import type { RawStatements } from "@/lib/metricNormalizer/types";
import { ProviderUnavailableError } from "@/lib/pipeline/errors";
import type { StatementProvider } from "@/lib/pipeline/types";
import { describeIssues, StatementsPayloadSchema, toRawStatements } from "./payload";

export interface HttpStatementProviderOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

const DEFAULT_TIMEOUT_MS = 10_000;

export class HttpStatementProvider implements StatementProvider {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: HttpStatementProviderOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.apiKey = opts.apiKey;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  statementsUrl(ticker: string): string {
    return `${this.baseUrl}/statements/${encodeURIComponent(ticker)}`;
  }

  async fetchStatements(ticker: string): Promise<RawStatements> {
    let res: Response;
    try {
      res = await this.fetchImpl(this.statementsUrl(ticker), {
        method: "GET",
        headers: {
          accept: "application/json",
          ...(this.apiKey ? { "x-api-key": this.apiKey } : {}),
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const msg = err instanceof Error ? err.message : "unknown";
      throw new ProviderUnavailableError(ticker, `request failed: ${msg}`, { cause: err });
    }

    if (!res.ok) {
      throw new ProviderUnavailableError(ticker, `http_${res.status}`, { status: res.status });
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch (err) {
      throw new ProviderUnavailableError(ticker, "response is not valid JSON", { cause: err });
    }

    const parsed = StatementsPayloadSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderUnavailableError(ticker, `invalid payload: ${describeIssues(parsed.error)}`);
    }
    return toRawStatements(parsed.data);
  }
}
