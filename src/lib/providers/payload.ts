import { z } from "zod";
import type { RawStatements } from "@/lib/metricNormalizer/types";

// Fiscal year is left as any number: the normalizer counts and skips malformed years.
export const RawStatementRowSchema = z.object({
  label: z.string(),
  value: z.number().nullable(),
  fiscalYear: z.number(),
});

export const StatementsPayloadSchema = z.object({
  ticker: z.string().optional(),
  income: z.array(RawStatementRowSchema).default([]),
  balance: z.array(RawStatementRowSchema).default([]),
  cashFlow: z.array(RawStatementRowSchema).default([]),
});

/** Statement fixtures keyed by ticker. */
export const StatementsFileSchema = z.record(z.string(), StatementsPayloadSchema);

export type StatementsPayload = z.infer<typeof StatementsPayloadSchema>;

export function toRawStatements(payload: StatementsPayload): RawStatements {
  return { income: payload.income, balance: payload.balance, cashFlow: payload.cashFlow };
}

/** First few zod issues as "path: message", for error details. */
export function describeIssues(error: z.ZodError, limit = 3): string {
  return error.issues
    .slice(0, limit)
    .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
    .join("; ");
}
