/**
 * Pipeline — Boundary errors.
 *
 * Only collaborator failures are thrown. Missing data never is: it flows
 * through the engine as null and ends up as "insufficient data".
 */

export type HealthPipelineErrorCode = "provider_unavailable" | "persistence_failed";

export class HealthPipelineError extends Error {
  readonly code: HealthPipelineErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: HealthPipelineErrorCode,
    details?: Record<string, unknown>,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "HealthPipelineError";
    this.code = code;
    this.details = details;
  }
}

export class ProviderUnavailableError extends HealthPipelineError {
  constructor(ticker: string, reason: string, options?: { cause?: unknown; status?: number }) {
    super(
      `Statements unavailable for ${ticker}: ${reason}`,
      "provider_unavailable",
      { ticker, reason, ...(options?.status !== undefined ? { status: options.status } : {}) },
      { cause: options?.cause },
    );
    this.name = "ProviderUnavailableError";
  }
}

export class PersistenceError extends HealthPipelineError {
  constructor(operation: string, cause: unknown, details?: Record<string, unknown>) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Persistence failed during ${operation}: ${reason}`, "persistence_failed", { operation, ...details }, { cause });
    this.name = "PersistenceError";
  }
}

export function isHealthPipelineError(err: unknown): err is HealthPipelineError {
  return err instanceof HealthPipelineError;
}
