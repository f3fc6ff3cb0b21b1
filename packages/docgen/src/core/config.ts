import { Err, Ok, type Result } from "@codebrief/core";
import * as z from "zod/v4";

import type { RetryPolicy } from "./services/retry.js";

const EnvSchema = z
  .object({
    GEMINI_API_KEY: z.string().optional(),
    CODEBRIEF_MODEL: z.string().default("gemini-2.5-flash-lite"),
    CODEBRIEF_CONCURRENCY: z.coerce.number().int().positive().default(15),
    CODEBRIEF_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
    CODEBRIEF_BASE_DELAY_MS: z.coerce.number().int().nonnegative().default(1000),
    CODEBRIEF_MAX_DELAY_MS: z.coerce.number().int().nonnegative().default(30000),
    CODEBRIEF_CACHE_FILE: z.string().default(".codebrief-cache.json"),
    CODEBRIEF_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  })
  .refine((env) => env.CODEBRIEF_MAX_DELAY_MS >= env.CODEBRIEF_BASE_DELAY_MS, {
    message: "must not be below CODEBRIEF_BASE_DELAY_MS",
    path: ["CODEBRIEF_MAX_DELAY_MS"],
  });

export interface DocgenConfig {
  /** Annotation is unavailable without it */
  apiKey?: string;
  model: string;
  concurrency: number;
  retry: RetryPolicy;
  /** Relative to the project root unless absolute */
  cacheFile: string;
  temperature: number;
}

/**
 * Read configuration from environment variables. Empty values count as unset.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Result<DocgenConfig, string> {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""));

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    return Err(`Invalid configuration: ${issues.join("; ")}`);
  }

  const values = parsed.data;
  return Ok({
    apiKey: values.GEMINI_API_KEY,
    model: values.CODEBRIEF_MODEL,
    concurrency: values.CODEBRIEF_CONCURRENCY,
    retry: {
      maxAttempts: values.CODEBRIEF_MAX_ATTEMPTS,
      baseDelayMs: values.CODEBRIEF_BASE_DELAY_MS,
      maxDelayMs: values.CODEBRIEF_MAX_DELAY_MS,
    },
    cacheFile: values.CODEBRIEF_CACHE_FILE,
    temperature: values.CODEBRIEF_TEMPERATURE,
  });
}
