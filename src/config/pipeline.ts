// src/config/pipeline.ts
// Tuning for the match/price/narrative pipeline, read from the environment.

import { z } from "zod";
import { ValidationError, isRetryableError } from "../lib/errors";
import type { RetryPolicy } from "../lib/retry";

const flag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

const PipelineEnvSchema = z.object({
  MATCH_TOP_K: z.coerce.number().int().min(1).max(50).default(10),
  MATCH_ACCEPTANCE_THRESHOLD: z.coerce.number().min(0).max(100).default(50),
  MATCH_NUMERIC_TOLERANCE_PERCENT: z.coerce
    .number()
    .positive()
    .max(100)
    .default(10),
  MATCH_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  RERANK_ENABLED: flag.default("false"),
  RERANK_TOP_N: z.coerce.number().int().min(2).max(10).default(3),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(250),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(4000),
  CURRENCY: z.string().trim().min(1).default("INR"),
});

export type MatchConfig = {
  topK: number;
  acceptanceThreshold: number;
  numericTolerancePercent: number;
  concurrency: number;
  rerank: {
    enabled: boolean;
    topN: number;
  };
};

export type PipelineConfig = {
  match: MatchConfig;
  retry: RetryPolicy;
  currency: string;
};

export function loadPipelineConfig(
  env: Record<string, string | undefined> = process.env
): PipelineConfig {
  // Blank variables from .env files count as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== "")
  );

  const parsed = PipelineEnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`
    );
    throw new ValidationError(`Invalid pipeline configuration`, issues);
  }

  const e = parsed.data;
  return {
    match: {
      topK: e.MATCH_TOP_K,
      acceptanceThreshold: e.MATCH_ACCEPTANCE_THRESHOLD,
      numericTolerancePercent: e.MATCH_NUMERIC_TOLERANCE_PERCENT,
      concurrency: e.MATCH_CONCURRENCY,
      rerank: {
        enabled: e.RERANK_ENABLED,
        topN: e.RERANK_TOP_N,
      },
    },
    retry: {
      maxAttempts: e.RETRY_MAX_ATTEMPTS,
      baseDelayMs: e.RETRY_BASE_DELAY_MS,
      maxDelayMs: Math.max(e.RETRY_MAX_DELAY_MS, e.RETRY_BASE_DELAY_MS),
      timeoutMs: e.UPSTREAM_TIMEOUT_MS,
      isRetryable: isRetryableError,
    },
    currency: e.CURRENCY,
  };
}
