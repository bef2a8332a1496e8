import { z } from "zod";
import { DUPLICATE_LABEL_POLICIES } from "@/lib/metricNormalizer/types";
import { QUICK_RATIO_POLICIES } from "@/lib/ratios/types";

const ServerEnvSchema = z.object({
  // Postgres (optional: runs fall back to the in-memory store)
  DATABASE_URL: z.string().min(1).optional(),

  // Statements provider
  STATEMENTS_API_URL: z.string().url().optional(),
  STATEMENTS_API_KEY: z.string().min(1).optional(),

  // Pipeline
  PIPELINE_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  DUPLICATE_LABEL_POLICY: z.enum(DUPLICATE_LABEL_POLICIES).default("alias_priority"),
  QUICK_RATIO_POLICY: z.enum(QUICK_RATIO_POLICIES).default("current_assets"),

  // App
  NODE_ENV: z.enum(["development", "test", "production"]).optional(),
});

export type ServerEnv = z.infer<typeof ServerEnvSchema>;

type EnvSource = Record<string, string | undefined>;

export function serverEnv(source: EnvSource = process.env): ServerEnv {
  const parsed = ServerEnvSchema.safeParse(source);
  if (!parsed.success) {
    // eslint-disable-next-line no-console
    console.error("❌ Invalid server env:", parsed.error.flatten().fieldErrors);
    throw new Error("Invalid server environment variables (see logs).");
  }
  return parsed.data;
}

export interface StatementsApiConfig {
  baseUrl: string;
  apiKey: string | undefined;
  timeoutMs: number;
}

export function requireStatementsApi(env: ServerEnv): StatementsApiConfig {
  if (!env.STATEMENTS_API_URL) {
    throw new Error("STATEMENTS_API_URL is required to fetch statements over HTTP");
  }
  return {
    baseUrl: env.STATEMENTS_API_URL,
    apiKey: env.STATEMENTS_API_KEY,
    timeoutMs: env.HTTP_TIMEOUT_MS,
  };
}
